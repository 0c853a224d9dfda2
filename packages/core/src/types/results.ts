import type { Task, Position } from './task.js';
import type { IndexError, StorageError, ValidationError } from '../errors.js';

/** Outcome of add / complete / delete */
export type MutationResult =
  | { readonly type: 'success'; readonly task: Task; readonly position: Position; readonly message: string }
  | {
      readonly type: 'unsaved';
      readonly task: Task;
      readonly position: Position;
      readonly message: string;
      readonly error: StorageError;
    }
  | { readonly type: 'invalid'; readonly error: ValidationError }
  | { readonly type: 'out-of-range'; readonly position: Position; readonly error: IndexError };

export type AppliedResult = Extract<MutationResult, { type: 'success' | 'unsaved' }>;

export function isSuccess(r: MutationResult): r is Extract<MutationResult, { type: 'success' }> {
  return r.type === 'success';
}

/** True when the in-memory sequence changed, whether or not it reached the file */
export function isApplied(r: MutationResult): r is AppliedResult {
  return r.type === 'success' || r.type === 'unsaved';
}

export function isError(r: MutationResult): boolean {
  return r.type !== 'success';
}
