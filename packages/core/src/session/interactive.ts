/**
 * Interactive front end: read a line, dispatch, report, repeat until `bye`.
 *
 * States are `running` and `exited`. Only the exit command leaves `running`;
 * it saves the list first. If the input ends before that, the session stops
 * without saving and stays `running`.
 */

import type { TaskList } from '../tasks/task-list.js';
import type { TaskStore } from '../storage/task-file.js';
import { StorageError } from '../storage/task-file.js';
import type { Outcome } from './dispatch.js';
import { dispatch } from './dispatch.js';
import { renderOutcome } from './response.js';

export type SessionState = 'running' | 'exited';

export type SessionEvent =
  | { readonly type: 'outcome'; readonly outcome: Outcome; readonly lines: string[] }
  | { readonly type: 'saved'; readonly path: string; readonly count: number }
  | { readonly type: 'save-failed'; readonly error: StorageError };

export type SessionListener = (event: SessionEvent) => void;

export class InteractiveSession {
  private state: SessionState = 'running';
  private tasks: TaskList;
  private readonly store: TaskStore;
  private readonly clock: () => Date;

  constructor(store: TaskStore, tasks: TaskList, clock: () => Date = () => new Date()) {
    this.store = store;
    this.tasks = tasks;
    this.clock = clock;
  }

  getState(): SessionState {
    return this.state;
  }

  getTasks(): TaskList {
    return this.tasks;
  }

  /** Process one line. Ignored once the session has exited. */
  handle(line: string, listener: SessionListener): void {
    if (this.state === 'exited') return;

    const result = dispatch(this.tasks, line, this.clock());
    this.tasks = result.tasks;
    listener({ type: 'outcome', outcome: result.outcome, lines: renderOutcome(result.outcome) });

    if (result.exit) {
      this.save(listener);
      this.state = 'exited';
    }
  }

  /** Consume lines until the exit command or the end of input */
  async run(lines: AsyncIterable<string>, listener: SessionListener): Promise<SessionState> {
    for await (const line of lines) {
      this.handle(line, listener);
      if (this.state === 'exited') break;
    }
    return this.state;
  }

  private save(listener: SessionListener): void {
    try {
      this.store.save(this.tasks);
      listener({ type: 'saved', path: this.store.path, count: this.tasks.size() });
    } catch (err: unknown) {
      if (!(err instanceof StorageError)) throw err;
      listener({ type: 'save-failed', error: err });
    }
  }
}
