// Types
export { TaskKind, TaskKindMarker, kindFromMarker } from './types/task-kind.js';
export type { Task, Todo, Deadline, Event } from './types/task.js';
export { createTodo, createDeadline, createEvent, markDone, matches, getWhen, isSameTask } from './types/task.js';
export type { CommandError, RecordError } from './types/errors.js';
export { emptyDescription, malformedCommand, indexOutOfRange, unknownCommand, malformedRecord } from './types/errors.js';
export type { Success, Result } from './types/results.js';
export { ok, isSuccess, isError } from './types/results.js';

// Task list
export { TaskList } from './tasks/task-list.js';
export type { Removal, Completion } from './tasks/task-list.js';

// Formatting
export { toDisplayString, formatNumbered, pluralizeTasks, DONE_MARKER, PENDING_MARKER } from './format/task-format.js';

// Parsers
export * from './parsers/index.js';

// Storage
export * from './storage/index.js';

// Config
export { getDefaultDataPath, resolveDataPath, DATA_FILE_ENV } from './config.js';

// Sessions
export * from './session/index.js';
