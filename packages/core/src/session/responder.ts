/**
 * Single-shot front end for embedding: one command in, one response string out.
 * Calls must be serialized by the host; the responder holds the only copy
 * of the task list.
 */

import assert from 'node:assert/strict';
import type { Task } from '../types/task.js';
import { isSameTask } from '../types/task.js';
import type { TaskList } from '../tasks/task-list.js';
import type { TaskStore } from '../storage/task-file.js';
import { StorageError } from '../storage/task-file.js';
import type { DispatchResult } from './dispatch.js';
import { dispatch } from './dispatch.js';
import { renderResponse } from './response.js';

export class Responder {
  private tasks: TaskList;
  /** The list as last loaded or saved */
  private saved: TaskList;
  private readonly store: TaskStore;
  private readonly clock: () => Date;

  constructor(store: TaskStore, tasks: TaskList, clock: () => Date = () => new Date()) {
    this.store = store;
    this.tasks = tasks;
    this.saved = tasks;
    this.clock = clock;
  }

  /** Load the store and build a responder over it; warnings are the skipped lines */
  static open(store: TaskStore, clock?: () => Date): { responder: Responder; warnings: string[] } {
    const { tasks, warnings } = store.load();
    return { responder: new Responder(store, tasks, clock), warnings };
  }

  getTasks(): TaskList {
    return this.tasks;
  }

  hasUnsavedChanges(): boolean {
    return this.tasks !== this.saved;
  }

  /** Respond to one command. `bye` saves; a failed save becomes the response. */
  respond(command: string): string {
    const result = dispatch(this.tasks, command, this.clock());
    checkConsistency(this.tasks, result);
    this.tasks = result.tasks;

    const response = renderResponse(result.outcome);
    if (!result.exit) return response;

    try {
      this.store.save(this.tasks);
    } catch (err: unknown) {
      if (err instanceof StorageError) return err.message;
      throw err;
    }
    this.saved = this.tasks;
    return response;
  }
}

function sameTasks(a: readonly Task[], b: readonly Task[]): boolean {
  return a.length === b.length && a.every((task, i) => {
    const other = b[i];
    return other !== undefined && isSameTask(task, other);
  });
}

/** Internal post-conditions; a failure here is a bug, not bad input */
export function checkConsistency(before: TaskList, result: DispatchResult): void {
  const { outcome, tasks } = result;
  switch (outcome.type) {
    case 'added': {
      assert.equal(tasks.size(), before.size() + 1, 'add should grow the list by one');
      const last = tasks.get(tasks.size());
      assert.ok(last.type === 'success' && isSameTask(last.data, outcome.task), 'task should be added to the list');
      break;
    }
    case 'deleted': {
      assert.equal(tasks.size(), before.size() - 1, 'task should be removed from the list');
      const was = before.asSequence();
      const now = tasks.asSequence();
      const at = was.findIndex((task, i) => {
        const kept = now[i];
        return kept === undefined || !isSameTask(task, kept);
      });
      const removed = was[at];
      assert.ok(removed !== undefined && isSameTask(removed, outcome.task), 'the removed task should come from the list');
      assert.ok(sameTasks(now, was.filter((_, i) => i !== at)), 'other tasks should keep their order');
      break;
    }
    case 'marked':
      assert.ok(outcome.task.done, 'task should be marked as done');
      break;
    case 'failed':
      assert.equal(tasks, before, 'a failed command should leave the list untouched');
      break;
    default:
      break;
  }
}
