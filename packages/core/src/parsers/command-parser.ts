/**
 * One entry point per command shape. Each takes the raw input line and
 * returns a Result; nothing here throws, and a failed parse leaves the
 * task list as it was.
 */

import type { Deadline, Event, Todo } from '../types/task.js';
import { createDeadline, createEvent, createTodo } from '../types/task.js';
import { emptyDescription, malformedCommand } from '../types/errors.js';
import type { Result } from '../types/results.js';
import { isSuccess, ok } from '../types/results.js';
import type { Completion, Removal, TaskList } from '../tasks/task-list.js';
import { parseDate } from './date-parser.js';

export const CommandWord = {
  List: 'list',
  Todo: 'todo',
  Deadline: 'deadline',
  Event: 'event',
  Done: 'done',
  Delete: 'delete',
  Find: 'find',
  Exit: 'bye',
} as const;

export type CommandWord = (typeof CommandWord)[keyof typeof CommandWord];

export const DEADLINE_SEPARATOR = '/by';
export const EVENT_SEPARATOR = '/at';

const INDEX_RE = /^[+-]?\d+$/;

export interface SplitCommand {
  readonly word: string;
  /** Everything after the command word, trimmed */
  readonly rest: string;
}

/** Split off the first whitespace-separated token */
export function splitCommand(line: string): SplitCommand {
  const trimmed = line.trim();
  const m = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  if (!m) return { word: '', rest: '' };
  return { word: m[1] ?? '', rest: (m[2] ?? '').trim() };
}

/**
 * Split `rest` at the first standalone `separator` token.
 * Returns null if the separator is missing.
 */
function splitOnSeparator(rest: string, separator: string): { before: string; after: string } | null {
  const re = new RegExp(`(?:^|\\s)${separator}(?=\\s|$)`);
  const m = re.exec(rest);
  if (!m) return null;
  return {
    before: rest.slice(0, m.index).trim(),
    after: rest.slice(m.index + m[0].length).trim(),
  };
}

export function parseAddTodo(line: string): Result<Todo> {
  const { rest } = splitCommand(line);
  if (!rest) return emptyDescription(CommandWord.Todo);
  return ok(createTodo(rest));
}

/**
 * `deadline <description> /by <date>`. Dates the date parser understands are
 * stored in canonical form; anything else is kept as typed.
 */
export function parseAddDeadline(line: string, now?: Date): Result<Deadline> {
  const { rest } = splitCommand(line);
  if (!rest) return emptyDescription(CommandWord.Deadline);

  const parts = splitOnSeparator(rest, DEADLINE_SEPARATOR);
  if (!parts) {
    return malformedCommand(`A deadline needs a date: deadline <description> ${DEADLINE_SEPARATOR} <date>`);
  }
  if (!parts.before) return malformedCommand(`The description of a deadline cannot be empty.`);
  if (!parts.after) return malformedCommand(`The date after ${DEADLINE_SEPARATOR} cannot be empty.`);

  return ok(createDeadline(parts.before, parseDate(parts.after, now) ?? parts.after));
}

/** `event <description> /at <date range>`; the range is free text */
export function parseAddEvent(line: string): Result<Event> {
  const { rest } = splitCommand(line);
  if (!rest) return emptyDescription(CommandWord.Event);

  const parts = splitOnSeparator(rest, EVENT_SEPARATOR);
  if (!parts) {
    return malformedCommand(`An event needs a time: event <description> ${EVENT_SEPARATOR} <date range>`);
  }
  if (!parts.before) return malformedCommand(`The description of an event cannot be empty.`);
  if (!parts.after) return malformedCommand(`The time after ${EVENT_SEPARATOR} cannot be empty.`);

  return ok(createEvent(parts.before, parts.after));
}

/** The single integer argument of `done` / `delete` */
export function parseIndex(line: string): Result<number> {
  const { word, rest } = splitCommand(line);
  if (!INDEX_RE.test(rest)) {
    return malformedCommand(`Please give a task number: ${word} <n>`);
  }
  const index = Number(rest);
  if (!Number.isSafeInteger(index)) return malformedCommand(`'${rest}' is not a valid task number.`);
  return ok(index);
}

export function parseDoneCommand(line: string, tasks: TaskList): Result<Completion> {
  const index = parseIndex(line);
  if (!isSuccess(index)) return index;
  return tasks.markDone(index.data);
}

export function parseDeleteCommand(line: string, tasks: TaskList): Result<Removal> {
  const index = parseIndex(line);
  if (!isSuccess(index)) return index;
  return tasks.delete(index.data);
}

/** An empty keyword matches every task */
export function parseFindCommand(line: string, tasks: TaskList): TaskList {
  return tasks.find(splitCommand(line).rest);
}
