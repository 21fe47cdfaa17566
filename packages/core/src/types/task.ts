import { TaskKind } from './task-kind.js';

interface TaskBase {
  readonly description: string;
  readonly done: boolean;
}

export interface Todo extends TaskBase {
  readonly kind: typeof TaskKind.Todo;
}

export interface Deadline extends TaskBase {
  readonly kind: typeof TaskKind.Deadline;
  /** yyyy-MM-dd, yyyy-MM-dd HH:mm, or the user's text when it is not a date */
  readonly by: string;
}

export interface Event extends TaskBase {
  readonly kind: typeof TaskKind.Event;
  readonly at: string;
}

export type Task = Todo | Deadline | Event;

export function createTodo(description: string, done = false): Todo {
  return { kind: TaskKind.Todo, description, done };
}

export function createDeadline(description: string, by: string, done = false): Deadline {
  return { kind: TaskKind.Deadline, description, done, by };
}

export function createEvent(description: string, at: string, done = false): Event {
  return { kind: TaskKind.Event, description, done, at };
}

/** Returns the task with its done flag set. Already-done tasks come back unchanged. */
export function markDone<T extends Task>(task: T): T {
  if (task.done) return task;
  return { ...task, done: true };
}

/** Case-sensitive substring match on the description; '' matches everything */
export function matches(task: Task, keyword: string): boolean {
  return task.description.includes(keyword);
}

/** The task's date field, or null for todos */
export function getWhen(task: Task): string | null {
  switch (task.kind) {
    case TaskKind.Todo: return null;
    case TaskKind.Deadline: return task.by;
    case TaskKind.Event: return task.at;
  }
}

export function isSameTask(a: Task, b: Task): boolean {
  return a.kind === b.kind
    && a.description === b.description
    && a.done === b.done
    && getWhen(a) === getWhen(b);
}
