/**
 * Error taxonomy for the task engine. Every error is returned or thrown to
 * the immediate caller; the engine never exits the process.
 */

export class TaskStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller supplied input the store refuses to store (empty description, bad due date) */
export class ValidationError extends TaskStoreError {}

/** A position outside [1, size] */
export class IndexError extends TaskStoreError {
  readonly position: number;
  readonly size: number;

  constructor(position: number, size: number) {
    super('Invalid task number');
    this.position = position;
    this.size = size;
  }
}

/** The storage file could not be read, parsed or written */
export class StorageError extends TaskStoreError {
  readonly filePath: string | null;

  constructor(message: string, filePath: string | null, cause?: unknown) {
    super(message, { cause });
    this.filePath = filePath;
  }
}
