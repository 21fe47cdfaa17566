/**
 * Ordered task collection with 1-based indexing for user-facing operations.
 * Instances are immutable: every change returns a new list and leaves the
 * receiver untouched, so a failed operation can never half-apply.
 */

import type { Task } from '../types/task.js';
import { isSameTask, markDone, matches } from '../types/task.js';
import { indexOutOfRange } from '../types/errors.js';
import type { Result } from '../types/results.js';
import { ok } from '../types/results.js';

export interface Removal {
  readonly tasks: TaskList;
  readonly removed: Task;
}

export interface Completion {
  readonly tasks: TaskList;
  readonly task: Task;
  /** false when the task was already done */
  readonly changed: boolean;
}

export class TaskList {
  private readonly items: readonly Task[];

  constructor(items: readonly Task[] = []) {
    this.items = [...items];
  }

  static empty(): TaskList {
    return new TaskList();
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Read-only view of the tasks in order, for rendering and saving */
  asSequence(): readonly Task[] {
    return this.items;
  }

  get(index: number): Result<Task> {
    const task = Number.isInteger(index) && index >= 1 ? this.items[index - 1] : undefined;
    return task === undefined ? indexOutOfRange(index, this.items.length) : ok(task);
  }

  add(task: Task): TaskList {
    return new TaskList([...this.items, task]);
  }

  delete(index: number): Result<Removal> {
    const found = this.get(index);
    if (found.type !== 'success') return found;

    const remaining = this.items.filter((_, i) => i !== index - 1);
    return ok({ tasks: new TaskList(remaining), removed: found.data });
  }

  markDone(index: number): Result<Completion> {
    const found = this.get(index);
    if (found.type !== 'success') return found;

    const task = found.data;
    if (task.done) return ok({ tasks: this, task, changed: false });

    const updated = markDone(task);
    const items = this.items.map((t, i) => (i === index - 1 ? updated : t));
    return ok({ tasks: new TaskList(items), task: updated, changed: true });
  }

  /** Tasks whose description contains `keyword`, in their original order */
  find(keyword: string): TaskList {
    return new TaskList(this.items.filter(t => matches(t, keyword)));
  }

  contains(task: Task): boolean {
    return this.items.some(t => isSameTask(t, task));
  }
}
