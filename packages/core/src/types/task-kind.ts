export const TaskKind = {
  Todo: 'todo',
  Deadline: 'deadline',
  Event: 'event',
} as const;

export type TaskKind = (typeof TaskKind)[keyof typeof TaskKind];

/** One-letter marker used in display strings and saved records */
export const TaskKindMarker: Record<TaskKind, string> = {
  [TaskKind.Todo]: 'T',
  [TaskKind.Deadline]: 'D',
  [TaskKind.Event]: 'E',
};

/** Reverse lookup of {@link TaskKindMarker} */
export function kindFromMarker(marker: string): TaskKind | null {
  switch (marker) {
    case 'T': return TaskKind.Todo;
    case 'D': return TaskKind.Deadline;
    case 'E': return TaskKind.Event;
    default: return null;
  }
}
