/**
 * CLI helpers: store opening, argument parsing, error handling.
 */

import type { MutationResult, Priority as PriorityType } from '@dolist/core';
import { TaskStore, Priority, getDefaultStoragePath, isError } from '@dolist/core';
import * as out from './output.js';

/** Options declared on the root program */
export interface GlobalOptions {
  file?: string;
}

const POSITION_RE = /^\d+$/;

/**
 * Open the store at an explicit path or the default one.
 * A file that fails to load is reported and the store starts empty.
 */
export function openStore(file: string | undefined): TaskStore {
  const store = new TaskStore(file ?? getDefaultStoragePath());
  if (store.loadError) {
    out.warning(`${store.loadError.message}. Starting with an empty list.`);
  }
  return store;
}

/**
 * Parse a priority string into a Priority value, or null when unrecognized.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/**
 * Parse a task number typed by the user. Digits only; range is the store's call.
 */
export function parsePosition(raw: string): number | null {
  const trimmed = raw.trim();
  return POSITION_RE.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/** Print an error and mark the run as failed */
export function fail(message: string): void {
  out.error(message);
  process.exitCode = 1;
}

/** Print a mutation result, failing the run unless it was fully applied and saved */
export function report(result: MutationResult): void {
  out.printResult(result);
  if (isError(result)) process.exitCode = 1;
}

/**
 * Run a command action, turning a thrown error into a message and a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    fail(err instanceof Error ? err.message : String(err));
  }
}
