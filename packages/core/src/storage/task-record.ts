/**
 * One saved line per task: `K | D | description[ | when]`.
 * K is the kind marker, D is 1 when done and 0 otherwise. A `|` or `\`
 * inside a field is written with a leading backslash; line breaks are
 * written as `\n` and `\r` so a record always stays on one line.
 */

import type { Task } from '../types/task.js';
import { createDeadline, createEvent, createTodo, getWhen } from '../types/task.js';
import { TaskKind, TaskKindMarker, kindFromMarker } from '../types/task-kind.js';
import type { RecordError } from '../types/errors.js';
import { malformedRecord } from '../types/errors.js';
import type { Result } from '../types/results.js';
import { ok } from '../types/results.js';

const SEPARATOR = ' | ';

const ESCAPES: Record<string, string> = { '\\': '\\\\', '|': '\\|', '\n': '\\n', '\r': '\\r' };
const UNESCAPES: Record<string, string> = { n: '\n', r: '\r' };

function escapeField(value: string): string {
  return value.replace(/[\\|\n\r]/g, ch => ESCAPES[ch] ?? ch);
}

/** Split on unescaped separators, unescaping as it goes */
function splitFields(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let i = 0;
  while (i < line.length) {
    const ch = line.charAt(i);
    if (ch === '\\' && i + 1 < line.length) {
      const next = line.charAt(i + 1);
      current += UNESCAPES[next] ?? next;
      i += 2;
    } else if (line.startsWith(SEPARATOR, i)) {
      fields.push(current);
      current = '';
      i += SEPARATOR.length;
    } else {
      current += ch;
      i += 1;
    }
  }
  fields.push(current);
  return fields;
}

export function toPersistedLine(task: Task): string {
  const fields = [TaskKindMarker[task.kind], task.done ? '1' : '0', task.description];
  const when = getWhen(task);
  if (when !== null) fields.push(when);
  return fields.map(escapeField).join(SEPARATOR);
}

export function fromPersistedLine(line: string): Result<Task, RecordError> {
  const [marker = '', doneFlag = '', description = '', ...rest] = splitFields(line);

  const kind = kindFromMarker(marker);
  if (kind === null) return malformedRecord(line, `unknown task kind '${marker}'`);
  if (doneFlag !== '0' && doneFlag !== '1') return malformedRecord(line, `done flag must be 0 or 1, got '${doneFlag}'`);
  if (!description.trim()) return malformedRecord(line, 'missing description');

  const done = doneFlag === '1';
  const expectedFields = kind === TaskKind.Todo ? 0 : 1;
  if (rest.length !== expectedFields) {
    return malformedRecord(line, `expected ${expectedFields + 3} fields, got ${rest.length + 3}`);
  }

  const [when = ''] = rest;
  switch (kind) {
    case TaskKind.Todo:
      return ok(createTodo(description, done));
    case TaskKind.Deadline:
      if (!when.trim()) return malformedRecord(line, 'missing deadline date');
      return ok(createDeadline(description, when, done));
    case TaskKind.Event:
      if (!when.trim()) return malformedRecord(line, 'missing event time');
      return ok(createEvent(description, when, done));
  }
}
