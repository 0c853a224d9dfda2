import type { Task, TaskInput } from '../types/task.js';
import { PriorityName, normalizePriority } from '../types/priority.js';

const pad = (n: number) => String(n).padStart(2, '0');

/** Calendar date of a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** yyyy-MM-dd HH:mm (local time, minute precision) */
export function formatTimestamp(d: Date): string {
  return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/**
 * Create a new Task. Only the priority is normalized here; an empty
 * description is the store's business.
 */
export function createTask(description: string, input: TaskInput = {}, now?: Date): Task {
  return {
    description,
    dueDate: input.dueDate ?? null,
    priority: normalizePriority(input.priority),
    completed: input.completed ?? false,
    createdAt: formatTimestamp(now ?? new Date()),
  };
}

/** Return a copy of the task marked done */
export function withCompleted(task: Task): Task {
  return { ...task, completed: true };
}

/** One-line view: `[✓] Buy milk (Priority: High, Due: 2024-01-10)` */
export function renderTask(task: Task): string {
  const mark = task.completed ? '✓' : ' ';
  const due = task.dueDate ? `, Due: ${task.dueDate}` : '';
  return `[${mark}] ${task.description} (Priority: ${PriorityName[task.priority]}${due})`;
}
