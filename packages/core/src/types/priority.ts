export const Priority = {
  High: 1,
  Medium: 2,
  Low: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.High]: 'High',
  [Priority.Medium]: 'Medium',
  [Priority.Low]: 'Low',
};

/** Priority used when none is given or the given one is out of range */
export const DEFAULT_PRIORITY: Priority = Priority.Medium;

export function isPriority(value: unknown): value is Priority {
  return value === Priority.High || value === Priority.Medium || value === Priority.Low;
}

/** Coerce anything outside {1, 2, 3} to Medium. Never throws. */
export function normalizePriority(value: unknown): Priority {
  return isPriority(value) ? value : DEFAULT_PRIORITY;
}
