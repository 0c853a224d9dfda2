import type { Priority } from './priority.js';

/** 1-based index into a store's current sequence; shifts when earlier tasks are deleted */
export type Position = number;

export interface Task {
  readonly description: string;
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly priority: Priority;
  readonly completed: boolean;
  readonly createdAt: string; // yyyy-MM-dd HH:mm, local time
}

export interface TaskInput {
  readonly dueDate?: string | null;
  readonly priority?: number;
  readonly completed?: boolean;
}

/** One row of a filtered listing */
export interface ListedTask {
  readonly position: Position;
  readonly task: Task;
}
