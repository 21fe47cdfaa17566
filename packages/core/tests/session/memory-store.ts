import type { TaskStore, LoadResult } from '../../src/storage/task-file.js';
import { StorageError } from '../../src/storage/task-file.js';
import { TaskList } from '../../src/tasks/task-list.js';
import type { Task } from '../../src/types/task.js';

/** In-process stand-in for the file store */
export class MemoryStore implements TaskStore {
  readonly path = 'memory://tasks';
  readonly saved: TaskList[] = [];
  failSaves = false;
  private readonly initial: LoadResult;

  constructor(tasks: Task[] = [], warnings: string[] = []) {
    this.initial = { tasks: new TaskList(tasks), warnings };
  }

  load(): LoadResult {
    return this.initial;
  }

  save(tasks: TaskList): void {
    if (this.failSaves) throw new StorageError(`Could not save tasks to ${this.path}: disk full`, this.path);
    this.saved.push(tasks);
  }
}
