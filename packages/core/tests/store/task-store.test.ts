import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TaskStore } from '../../src/store/task-store.js';
import { IndexError, StorageError, ValidationError } from '../../src/errors.js';
import { Priority } from '../../src/types/priority.js';
import { renderTask } from '../../src/task/task-helpers.js';
import type { MutationResult } from '../../src/types/results.js';
import type { Task } from '../../src/types/task.js';

let tmpDir: string;
let filePath: string;
const clock = () => new Date(2024, 0, 5, 9, 7);

function openStore(path: string = filePath): TaskStore {
  return new TaskStore(path, { now: clock });
}

function taskOf(result: MutationResult): Task {
  if (result.type !== 'success' && result.type !== 'unsaved') {
    throw new Error(`expected an applied mutation, got ${result.type}`);
  }
  return result.task;
}

function positions(store: TaskStore, ...args: Parameters<TaskStore['list']>): number[] {
  return [...store.list(...args)].map(entry => entry.position);
}

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'dolist-store-test-'));
  filePath = join(tmpDir, 'tasks.json');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('constructor', () => {
  it('starts empty when the file does not exist', () => {
    const store = openStore();
    expect(store.size).toBe(0);
    expect(store.loadError).toBeNull();
    expect(existsSync(filePath)).toBe(false);
  });

  it('degrades to an empty store on a malformed file', () => {
    writeFileSync(filePath, 'not json');
    const store = openStore();
    expect(store.size).toBe(0);
    expect(store.loadError).toBeInstanceOf(StorageError);
    expect(store.loadError?.filePath).toBe(filePath);
  });

  it('degrades to an empty store when the path is a directory', () => {
    const store = openStore(tmpDir);
    expect(store.size).toBe(0);
    expect(store.loadError).toBeInstanceOf(StorageError);
  });
});

describe('add', () => {
  it('appends an open task and persists it', () => {
    const store = openStore();
    const result = store.add('Buy milk', { dueDate: '2024-01-10', priority: Priority.High });

    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(result.position).toBe(1);
    expect(result.message).toBe('Added task: [ ] Buy milk (Priority: High, Due: 2024-01-10)');
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual([{
      description: 'Buy milk',
      due_date: '2024-01-10',
      priority: 1,
      completed: false,
      created_at: '2024-01-05 09:07',
    }]);
  });

  it('adds exactly one entry with an invalid priority rendered as medium', () => {
    const store = openStore();
    store.add('First');
    store.add('Second', { priority: 9 });

    const listed = [...store.list({ showCompleted: true })];
    expect(listed).toHaveLength(2);
    expect(listed[1]?.position).toBe(2);
    expect(renderTask(listed[1]!.task)).toBe('[ ] Second (Priority: Medium)');
  });

  it('trims the description', () => {
    const store = openStore();
    expect(taskOf(store.add('  Walk dog  ')).description).toBe('Walk dog');
  });

  it('rejects an empty description without touching the file', () => {
    const store = openStore();
    const result = store.add('   ');
    expect(result.type).toBe('invalid');
    if (result.type !== 'invalid') return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe('Description cannot be empty');
    expect(store.size).toBe(0);
    expect(existsSync(filePath)).toBe(false);
  });

  it('rejects a malformed due date', () => {
    const store = openStore();
    const result = store.add('Pay rent', { dueDate: '2024-02-30' });
    expect(result.type).toBe('invalid');
    expect(store.size).toBe(0);
  });

  it('treats a blank due date as none', () => {
    const store = openStore();
    expect(taskOf(store.add('Pay rent', { dueDate: ' ' })).dueDate).toBeNull();
  });
});

describe('list', () => {
  it('hides completed tasks unless asked', () => {
    const store = openStore();
    store.add('a');
    store.add('b');
    store.add('c');
    store.complete(2);

    expect(positions(store)).toEqual([1, 3]);
    expect(positions(store, { showCompleted: true })).toEqual([1, 2, 3]);
  });

  it('filters by priority without reordering', () => {
    const store = openStore();
    store.add('high open', { priority: Priority.High });
    store.add('low', { priority: Priority.Low });
    store.add('high done', { priority: Priority.High });
    store.add('high later', { priority: Priority.High });
    store.complete(3);

    const listed = [...store.list({ priority: Priority.High })];
    expect(listed.map(e => [e.position, e.task.description])).toEqual([
      [1, 'high open'],
      [4, 'high later'],
    ]);
  });

  it('returns exactly the uncompleted high task out of two high tasks', () => {
    const store = openStore();
    store.add('done', { priority: Priority.High });
    store.add('open', { priority: Priority.High });
    store.add('medium');
    store.complete(1);

    const listed = [...store.list({ showCompleted: false, priority: Priority.High })];
    expect(listed).toHaveLength(1);
    expect(listed[0]?.task.description).toBe('open');
  });

  it('can be iterated more than once and reflects later changes', () => {
    const store = openStore();
    store.add('a');
    const view = store.list();

    expect([...view]).toHaveLength(1);
    expect([...view]).toHaveLength(1);
    store.add('b');
    expect([...view]).toHaveLength(2);
  });

  it('does not persist', () => {
    const store = openStore();
    [...store.list()];
    expect(existsSync(filePath)).toBe(false);
  });
});

describe('complete', () => {
  it('marks the task done and persists', () => {
    const store = openStore();
    store.add('Buy milk');
    const result = store.complete(1);

    expect(result.type).toBe('success');
    expect(taskOf(result).completed).toBe(true);
    expect(store.get(1)?.completed).toBe(true);
    expect(openStore().get(1)?.completed).toBe(true);
  });

  it('succeeds again on an already completed task', () => {
    const store = openStore();
    store.add('Buy milk');
    store.complete(1);
    const again = store.complete(1);

    expect(again.type).toBe('success');
    if (again.type !== 'success') return;
    expect(again.task.completed).toBe(true);
    expect(again.message).toBe('Task already completed: [✓] Buy milk (Priority: Medium)');
  });

  it.each([0, 2, -1, 1.5, Number.NaN])('fails with IndexError for position %s', (position) => {
    const store = openStore();
    store.add('only');
    const before = readFileSync(filePath, 'utf-8');

    const result = store.complete(position);
    expect(result.type).toBe('out-of-range');
    if (result.type !== 'out-of-range') return;
    expect(result.error).toBeInstanceOf(IndexError);
    expect(result.error.message).toBe('Invalid task number');
    expect(result.error.size).toBe(1);
    expect(store.get(1)?.completed).toBe(false);
    expect(readFileSync(filePath, 'utf-8')).toBe(before);
  });
});

describe('delete', () => {
  it('removes one task and shifts later positions down', () => {
    const store = openStore();
    store.add('a');
    store.add('b');
    store.add('c');

    const result = store.delete(2);
    expect(taskOf(result).description).toBe('b');
    expect(store.size).toBe(2);
    expect(store.get(2)?.description).toBe('c');
    expect(openStore().all().map(t => t.description)).toEqual(['a', 'c']);
  });

  it('fails with IndexError out of range and leaves the file alone', () => {
    const store = openStore();
    store.add('a');
    const before = readFileSync(filePath, 'utf-8');

    expect(store.delete(0).type).toBe('out-of-range');
    expect(store.delete(2).type).toBe('out-of-range');
    expect(store.size).toBe(1);
    expect(readFileSync(filePath, 'utf-8')).toBe(before);
  });
});

describe('persistence', () => {
  it('round-trips every field, createdAt included, in order', () => {
    let tick = 0;
    const store = new TaskStore(filePath, { now: () => new Date(2024, 0, 5, 9, tick++) });
    store.add('one', { dueDate: '2024-01-10', priority: Priority.High });
    store.add('two', { priority: Priority.Low });
    store.add('three');
    store.complete(2);

    const reloaded = new TaskStore(filePath, { now: () => new Date(2030, 0, 1) });
    expect(reloaded.all()).toEqual(store.all());
    expect(reloaded.all().map(t => t.createdAt)).toEqual([
      '2024-01-05 09:00',
      '2024-01-05 09:01',
      '2024-01-05 09:02',
    ]);
  });

  it('creates the parent directory on save', () => {
    const nested = join(tmpDir, 'a', 'b', 'tasks.json');
    const store = openStore(nested);
    expect(store.add('x').type).toBe('success');
    expect(existsSync(nested)).toBe(true);
  });

  it('keeps the mutation in memory when the save fails', () => {
    const blocker = join(tmpDir, 'blocker');
    writeFileSync(blocker, '');
    const store = openStore(join(blocker, 'tasks.json'));

    const result = store.add('Buy milk');
    expect(result.type).toBe('unsaved');
    if (result.type !== 'unsaved') return;
    expect(result.error).toBeInstanceOf(StorageError);
    expect(result.task.description).toBe('Buy milk');
    expect(store.size).toBe(1);
    expect(() => store.save()).toThrow(StorageError);
  });

  it('empties the store when a reload fails', () => {
    const store = openStore();
    store.add('a');
    writeFileSync(filePath, '[{"description": 1}]');

    expect(() => store.load()).toThrow(StorageError);
    expect(store.size).toBe(0);
    expect(store.loadError?.message).toContain('record 1 has no description');
  });

  it('load replaces the in-memory sequence', () => {
    const store = openStore();
    store.add('a');
    writeFileSync(filePath, '[]');
    store.load();
    expect(store.size).toBe(0);
    expect(store.loadError).toBeNull();
  });
});

describe('end to end', () => {
  it('adds, lists, completes and deletes a task', () => {
    const store = openStore();
    store.add('Buy milk', { dueDate: '2024-01-10', priority: 1 });

    const open = [...store.list()];
    expect(open.map(e => `${e.position}. ${renderTask(e.task)}`)).toEqual([
      '1. [ ] Buy milk (Priority: High, Due: 2024-01-10)',
    ]);

    store.complete(1);
    const all = [...store.list({ showCompleted: true })];
    expect(all.map(e => renderTask(e.task))).toEqual(['[✓] Buy milk (Priority: High, Due: 2024-01-10)']);

    store.delete(1);
    expect(store.size).toBe(0);
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual([]);
  });
});
