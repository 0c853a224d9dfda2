/**
 * Owns the task sequence and keeps it in sync with the tasks file.
 *
 * Tasks are addressed by position: their 1-based index in the current
 * sequence. There is no stored id, so deleting a task shifts every later
 * task down by one, and a position read before a mutation may name a
 * different task after it.
 *
 * Every mutation writes the whole sequence back before returning. The file
 * is assumed to belong to this store alone for the life of the process.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Task, TaskInput, ListedTask, Position } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import type { MutationResult } from '../types/results.js';
import { IndexError, StorageError, ValidationError } from '../errors.js';
import { createTask, renderTask, withCompleted } from '../task/task-helpers.js';
import { parseTaskFile, serializeTasks } from '../storage/task-file.js';
import { isIsoDate } from '../parsers/date-parser.js';

export interface TaskStoreOptions {
  /** Clock used to stamp createdAt on new tasks. Defaults to the current time. */
  now?: () => Date;
}

export interface ListOptions {
  /** Include completed tasks (default false) */
  showCompleted?: boolean;
  /** Only tasks with exactly this priority */
  priority?: Priority;
}

export type AddInput = Omit<TaskInput, 'completed'>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TaskStore {
  private readonly path: string;
  private readonly now: () => Date;
  private tasks: Task[] = [];
  private lastLoadError: StorageError | null = null;

  constructor(filePath: string, options: TaskStoreOptions = {}) {
    this.path = filePath;
    this.now = options.now ?? (() => new Date());

    try {
      this.load();
    } catch (err: unknown) {
      // Degrade to an empty store; the error stays readable on loadError
      if (!(err instanceof StorageError)) throw err;
    }
  }

  get size(): number { return this.tasks.length; }

  /** The error from the last failed load, or null. The store is empty when set. */
  get loadError(): StorageError | null { return this.lastLoadError; }

  /** Readonly snapshot of the sequence */
  all(): readonly Task[] {
    return [...this.tasks];
  }

  /** Task at a 1-based position, or null when out of range */
  get(position: Position): Task | null {
    return this.inRange(position) ? this.tasks[position - 1] ?? null : null;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  /** Append a new, uncompleted task. Rejects an empty description or a malformed due date. */
  add(description: string, input: AddInput = {}): MutationResult {
    const trimmed = description.trim();
    if (!trimmed) {
      return { type: 'invalid', error: new ValidationError('Description cannot be empty') };
    }

    const dueDate = input.dueDate?.trim() || null;
    if (dueDate !== null && !isIsoDate(dueDate)) {
      return { type: 'invalid', error: new ValidationError(`Invalid due date '${dueDate}', expected YYYY-MM-DD`) };
    }

    const task = createTask(trimmed, { dueDate, priority: input.priority }, this.now());
    this.tasks.push(task);
    return this.persist(task, this.tasks.length, `Added task: ${renderTask(task)}`);
  }

  /** Mark the task at a position done. Completing a done task again succeeds. */
  complete(position: Position): MutationResult {
    const current = this.get(position);
    if (!current) return this.outOfRange(position);

    const task = withCompleted(current);
    this.tasks[position - 1] = task;
    const message = current.completed
      ? `Task already completed: ${renderTask(task)}`
      : `Marked task as completed: ${renderTask(task)}`;
    return this.persist(task, position, message);
  }

  /** Remove the task at a position. Every later task moves up one position. */
  delete(position: Position): MutationResult {
    if (!this.inRange(position)) return this.outOfRange(position);

    const [removed] = this.tasks.splice(position - 1, 1);
    if (!removed) return this.outOfRange(position);
    return this.persist(removed, position, `Deleted task: ${renderTask(removed)}`);
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  /**
   * Filtered view in sequence order. The result can be iterated any number of
   * times; each pass reads the sequence as it is when the pass starts.
   */
  list(options: ListOptions = {}): Iterable<ListedTask> {
    return { [Symbol.iterator]: () => this.iterate(options) };
  }

  private *iterate(options: ListOptions): Generator<ListedTask> {
    const { showCompleted = false, priority } = options;
    const snapshot = [...this.tasks];

    for (const [i, task] of snapshot.entries()) {
      if (task.completed && !showCompleted) continue;
      if (priority != null && task.priority !== priority) continue;
      yield { position: i + 1, task };
    }
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /** Write the whole sequence to the file. Memory stays as it is if this throws. */
  save(): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, serializeTasks(this.tasks), 'utf-8');
    } catch (err: unknown) {
      throw new StorageError(`Error saving tasks to ${this.path}: ${errorMessage(err)}`, this.path, err);
    }
  }

  /** Replace the sequence with the file's contents. On failure the store is left empty. */
  load(): void {
    this.tasks = [];
    this.lastLoadError = null;
    if (!existsSync(this.path)) return;

    try {
      this.tasks = parseTaskFile(readFileSync(this.path, 'utf-8'));
    } catch (err: unknown) {
      this.lastLoadError = new StorageError(
        `Error loading tasks from ${this.path}: ${errorMessage(err)}`, this.path, err,
      );
      throw this.lastLoadError;
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private inRange(position: Position): boolean {
    return Number.isInteger(position) && position >= 1 && position <= this.tasks.length;
  }

  private outOfRange(position: Position): MutationResult {
    return { type: 'out-of-range', position, error: new IndexError(position, this.tasks.length) };
  }

  private persist(task: Task, position: Position, message: string): MutationResult {
    try {
      this.save();
    } catch (err: unknown) {
      if (!(err instanceof StorageError)) throw err;
      return { type: 'unsaved', task, position, message, error: err };
    }
    return { type: 'success', task, position, message };
  }
}
