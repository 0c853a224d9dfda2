// Types
export { Priority, PriorityName, DEFAULT_PRIORITY, isPriority, normalizePriority } from './types/index.js';
export type { Position, Task, TaskInput, ListedTask, MutationResult, AppliedResult } from './types/index.js';
export { isSuccess, isApplied, isError } from './types/index.js';

// Errors
export { TaskStoreError, ValidationError, IndexError, StorageError } from './errors.js';

// Task
export { createTask, withCompleted, renderTask, formatDate, formatTimestamp } from './task/task-helpers.js';

// Parsers
export { parseDate, isIsoDate } from './parsers/index.js';

// Storage
export { serializeTasks, parseTaskFile, UNKNOWN_CREATED_AT } from './storage/task-file.js';
export type { TaskRecord } from './storage/task-file.js';
export { getDefaultStoragePath, getDataDir, STORAGE_FILE_ENV } from './paths.js';

// Store
export { TaskStore } from './store/task-store.js';
export type { TaskStoreOptions, ListOptions, AddInput } from './store/task-store.js';
