/**
 * User-input errors. Every parser and task-list failure is one of these;
 * the dispatch boundary renders `message` and carries on.
 */

export type CommandError =
  | { readonly type: 'empty-description'; readonly message: string }
  | { readonly type: 'malformed-command'; readonly message: string }
  | { readonly type: 'index-out-of-range'; readonly index: number; readonly size: number; readonly message: string }
  | { readonly type: 'unknown-command'; readonly command: string; readonly message: string };

/** A saved line that could not be read back as a task */
export interface RecordError {
  readonly type: 'malformed-record';
  readonly line: string;
  readonly message: string;
}

export function emptyDescription(command: string): CommandError {
  return { type: 'empty-description', message: `The description of a ${command} cannot be empty.` };
}

export function malformedCommand(message: string): CommandError {
  return { type: 'malformed-command', message };
}

export function indexOutOfRange(index: number, size: number): CommandError {
  const message = size === 0
    ? `There is no task ${index}: your list is empty.`
    : `There is no task ${index}: pick a number from 1 to ${size}.`;
  return { type: 'index-out-of-range', index, size, message };
}

export function unknownCommand(command: string): CommandError {
  return { type: 'unknown-command', command, message: "I'm sorry, but I don't know what that means." };
}

export function malformedRecord(line: string, reason: string): RecordError {
  return { type: 'malformed-record', line, message: reason };
}
