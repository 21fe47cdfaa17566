export { toPersistedLine, fromPersistedLine } from './task-record.js';
export { StorageError, loadTasks, saveTasks, parseTaskFile, serializeTasks, createFileStore } from './task-file.js';
export type { LoadResult, TaskStore } from './task-file.js';
