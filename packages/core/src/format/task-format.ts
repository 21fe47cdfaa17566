import type { Task } from '../types/task.js';
import { TaskKind, TaskKindMarker } from '../types/task-kind.js';
import { formatDisplayDate } from '../parsers/date-parser.js';

export const DONE_MARKER = 'X';
export const PENDING_MARKER = ' ';

/** `[K][M] description (date info)` */
export function toDisplayString(task: Task): string {
  const head = `[${TaskKindMarker[task.kind]}][${task.done ? DONE_MARKER : PENDING_MARKER}] ${task.description}`;
  switch (task.kind) {
    case TaskKind.Todo: return head;
    case TaskKind.Deadline: return `${head} (by: ${formatDisplayDate(task.by)})`;
    case TaskKind.Event: return `${head} (at: ${task.at})`;
  }
}

/** Numbered lines for a list of tasks, starting at 1 */
export function formatNumbered(tasks: readonly Task[]): string[] {
  return tasks.map((task, i) => `${i + 1}.${toDisplayString(task)}`);
}

export function pluralizeTasks(count: number): string {
  return count === 1 ? '1 task' : `${count} tasks`;
}
