/**
 * Reads and writes the task file. The whole file is rewritten on every save;
 * there is no temp-file swap, so a crash mid-write can truncate it.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import type { Task } from '../types/task.js';
import { isSuccess } from '../types/results.js';
import { TaskList } from '../tasks/task-list.js';
import { fromPersistedLine, toPersistedLine } from './task-record.js';

export class StorageError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.path = path;
  }
}

export interface LoadResult {
  readonly tasks: TaskList;
  /** One entry per skipped line */
  readonly warnings: string[];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parse file contents. Blank lines are ignored, malformed ones skipped with a warning. */
export function parseTaskFile(contents: string): LoadResult {
  const tasks: Task[] = [];
  const warnings: string[] = [];

  contents.split(/\r?\n/).forEach((line, i) => {
    if (!line.trim()) return;
    const result = fromPersistedLine(line);
    if (isSuccess(result)) {
      tasks.push(result.data);
    } else {
      warnings.push(`Skipped line ${i + 1}: ${result.message}`);
    }
  });

  return { tasks: new TaskList(tasks), warnings };
}

export function serializeTasks(tasks: TaskList): string {
  return tasks.asSequence().map(t => toPersistedLine(t) + '\n').join('');
}

/** Load the task file. A file that does not exist yet is an empty list. */
export function loadTasks(path: string): LoadResult {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return { tasks: TaskList.empty(), warnings: [] };
    throw new StorageError(`Could not read tasks from ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
  return parseTaskFile(contents);
}

/** Overwrite the task file. The parent directory must already exist. */
export function saveTasks(path: string, tasks: TaskList): void {
  try {
    writeFileSync(path, serializeTasks(tasks), 'utf8');
  } catch (err: unknown) {
    throw new StorageError(`Could not save tasks to ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
}

/** Where a session loads its tasks from and saves them back to */
export interface TaskStore {
  readonly path: string;
  load(): LoadResult;
  save(tasks: TaskList): void;
}

export function createFileStore(path: string): TaskStore {
  return {
    path,
    load: () => loadTasks(path),
    save: tasks => saveTasks(path, tasks),
  };
}
