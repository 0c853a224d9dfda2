export { Priority, PriorityName, DEFAULT_PRIORITY, isPriority, normalizePriority } from './priority.js';
export type { Position, Task, TaskInput, ListedTask } from './task.js';
export type { MutationResult, AppliedResult } from './results.js';
export { isSuccess, isApplied, isError } from './results.js';
