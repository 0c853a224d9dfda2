/**
 * JSON codec for the tasks file: a flat array of records in sequence order.
 *
 *   [{ "description": "...", "due_date": "2024-01-10" | null,
 *      "priority": 1, "completed": false, "created_at": "2024-01-01 09:30" }]
 */

import type { Task } from '../types/task.js';
import { normalizePriority } from '../types/priority.js';
import { StorageError } from '../errors.js';

/** created_at written by files that predate the field */
export const UNKNOWN_CREATED_AT = 'Unknown';

export interface TaskRecord {
  description: string;
  due_date: string | null;
  priority: number;
  completed: boolean;
  created_at: string;
}

function toRecord(task: Task): TaskRecord {
  return {
    description: task.description,
    due_date: task.dueDate,
    priority: task.priority,
    completed: task.completed,
    created_at: task.createdAt,
  };
}

export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord), null, 2);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromRecord(value: unknown, index: number): Task {
  const where = `record ${index + 1}`;
  if (!isObject(value)) throw new StorageError(`Malformed tasks file: ${where} is not an object`, null);

  const { description, due_date: dueDate, priority, completed, created_at: createdAt } = value;
  if (typeof description !== 'string') {
    throw new StorageError(`Malformed tasks file: ${where} has no description`, null);
  }
  if (dueDate !== undefined && dueDate !== null && typeof dueDate !== 'string') {
    throw new StorageError(`Malformed tasks file: ${where} has an invalid due_date`, null);
  }
  if (typeof completed !== 'boolean') {
    throw new StorageError(`Malformed tasks file: ${where} has an invalid completed flag`, null);
  }
  if (createdAt !== undefined && typeof createdAt !== 'string') {
    throw new StorageError(`Malformed tasks file: ${where} has an invalid created_at`, null);
  }

  return {
    description,
    dueDate: typeof dueDate === 'string' ? dueDate : null,
    priority: normalizePriority(priority),
    completed,
    createdAt: typeof createdAt === 'string' ? createdAt : UNKNOWN_CREATED_AT,
  };
}

/** Parse file contents into tasks. Throws StorageError; never returns a partial list. */
export function parseTaskFile(text: string): Task[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw new StorageError('Malformed tasks file: invalid JSON', null, err);
  }

  if (!Array.isArray(data)) {
    throw new StorageError('Malformed tasks file: expected an array of tasks', null);
  }
  return data.map((record: unknown, i) => fromRecord(record, i));
}
