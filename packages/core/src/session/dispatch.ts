/**
 * Command dispatch shared by every front end: (tasks, line) -> (tasks, outcome).
 * Pure; saving on exit is left to the caller.
 */

import type { Task } from '../types/task.js';
import type { CommandError } from '../types/errors.js';
import { unknownCommand } from '../types/errors.js';
import type { Result } from '../types/results.js';
import { isSuccess } from '../types/results.js';
import type { TaskList } from '../tasks/task-list.js';
import {
  CommandWord,
  splitCommand,
  parseAddTodo,
  parseAddDeadline,
  parseAddEvent,
  parseDoneCommand,
  parseDeleteCommand,
  parseFindCommand,
} from '../parsers/command-parser.js';

export type Outcome =
  | { readonly type: 'listed'; readonly tasks: readonly Task[] }
  | { readonly type: 'added'; readonly task: Task; readonly size: number }
  | { readonly type: 'marked'; readonly task: Task; readonly changed: boolean }
  | { readonly type: 'deleted'; readonly task: Task; readonly size: number }
  | { readonly type: 'found'; readonly keyword: string; readonly tasks: readonly Task[] }
  | { readonly type: 'exit' }
  | { readonly type: 'failed'; readonly error: CommandError };

export interface DispatchResult {
  readonly tasks: TaskList;
  readonly outcome: Outcome;
  /** true only for the exit command */
  readonly exit: boolean;
}

function stay(tasks: TaskList, outcome: Outcome): DispatchResult {
  return { tasks, outcome, exit: false };
}

function add(tasks: TaskList, parsed: Result<Task>): DispatchResult {
  if (!isSuccess(parsed)) return stay(tasks, { type: 'failed', error: parsed });
  const next = tasks.add(parsed.data);
  return stay(next, { type: 'added', task: parsed.data, size: next.size() });
}

export function dispatch(tasks: TaskList, line: string, now?: Date): DispatchResult {
  const { word } = splitCommand(line);

  switch (word) {
    case CommandWord.List:
      return stay(tasks, { type: 'listed', tasks: tasks.asSequence() });
    case CommandWord.Todo:
      return add(tasks, parseAddTodo(line));
    case CommandWord.Deadline:
      return add(tasks, parseAddDeadline(line, now));
    case CommandWord.Event:
      return add(tasks, parseAddEvent(line));
    case CommandWord.Done: {
      const result = parseDoneCommand(line, tasks);
      if (!isSuccess(result)) return stay(tasks, { type: 'failed', error: result });
      const { task, changed } = result.data;
      return stay(result.data.tasks, { type: 'marked', task, changed });
    }
    case CommandWord.Delete: {
      const result = parseDeleteCommand(line, tasks);
      if (!isSuccess(result)) return stay(tasks, { type: 'failed', error: result });
      const { removed } = result.data;
      return stay(result.data.tasks, { type: 'deleted', task: removed, size: result.data.tasks.size() });
    }
    case CommandWord.Find: {
      const found = parseFindCommand(line, tasks);
      return stay(tasks, { type: 'found', keyword: splitCommand(line).rest, tasks: found.asSequence() });
    }
    case CommandWord.Exit:
      return { tasks, outcome: { type: 'exit' }, exit: true };
    default:
      return stay(tasks, { type: 'failed', error: unknownCommand(word) });
  }
}
