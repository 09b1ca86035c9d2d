import { describe, it, expect, beforeEach } from 'vitest';
import { createStore, type ForestStore } from '../../src/forest/store.js';
import { createRootCategory } from '../../src/queries/category-queries.js';
import {
  createTask,
  findTask,
  appendTask,
  detachTask,
  snapshotFields,
  assignFields,
  getSortedTasks,
} from '../../src/queries/task-queries.js';
import { Priority } from '../../src/types/priority.js';
import type { TaskFields } from '../../src/types/task.js';
import type { Category } from '../../src/types/category.js';

function fields(title: string, priority: Priority, dueDate: string): TaskFields {
  return { title, description: '', priority, dueDate };
}

let store: ForestStore;
let work: Category;

beforeEach(() => {
  store = createStore();
  work = createRootCategory(store, 'Work');
});

describe('createTask', () => {
  it('allocates increasing ids and copies the fields', () => {
    const a = createTask(store, { title: 'A', description: 'first', priority: Priority.High, dueDate: '2030-01-01' });
    const b = createTask(store, fields('B', Priority.Low, '2030-01-02'));
    expect(a).toEqual({ id: 1, title: 'A', description: 'first', priority: 1, dueDate: '2030-01-01' });
    expect(b.id).toBe(2);
    expect(store.nextTaskId).toBe(3);
  });
});

describe('appendTask / detachTask', () => {
  it('appends at the end and removes by identity', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    const b = createTask(store, fields('B', Priority.Low, '2030-01-01'));
    appendTask(work, a);
    appendTask(work, b);
    expect(work.tasks).toEqual([a, b]);

    expect(detachTask(work, a)).toBe(true);
    expect(work.tasks).toEqual([b]);
    expect(detachTask(work, a)).toBe(false);
  });

  it('does not append a task that is already in the list', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    expect(appendTask(work, a)).toBe(true);
    expect(appendTask(work, a)).toBe(false);
    expect(work.tasks).toHaveLength(1);
  });

  it('detaches by identity, not by equal contents', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    appendTask(work, a);
    expect(detachTask(work, { ...a })).toBe(false);
    expect(work.tasks).toEqual([a]);
  });
});

describe('findTask', () => {
  it('finds direct tasks by id', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    appendTask(work, a);
    expect(findTask(work, 1)).toBe(a);
    expect(findTask(work, 2)).toBeUndefined();
  });
});

describe('snapshotFields / assignFields', () => {
  it('snapshot is frozen and independent of later changes', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    const snap = snapshotFields(a);
    assignFields(a, fields('B', Priority.High, '2031-05-05'));

    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap).toEqual({ title: 'A', description: '', priority: 3, dueDate: '2030-01-01' });
    expect(a).toEqual({ id: 1, title: 'B', description: '', priority: 1, dueDate: '2031-05-05' });
  });
});

describe('getSortedTasks', () => {
  it('orders by priority then due date, keeping list order for ties', () => {
    const tasks = [
      createTask(store, fields('low-early', Priority.Low, '2025-01-01')),
      createTask(store, fields('high-late', Priority.High, '2030-01-01')),
      createTask(store, fields('high-early', Priority.High, '2026-06-01')),
      createTask(store, fields('medium-tie-1', Priority.Medium, '2027-01-01')),
      createTask(store, fields('medium-tie-2', Priority.Medium, '2027-01-01')),
    ];
    for (const t of tasks) appendTask(work, t);

    expect(getSortedTasks(work).map(t => t.title)).toEqual([
      'high-early', 'high-late', 'medium-tie-1', 'medium-tie-2', 'low-early',
    ]);
  });

  it('returns a copy and leaves the category order alone', () => {
    const a = createTask(store, fields('A', Priority.Low, '2030-01-01'));
    const b = createTask(store, fields('B', Priority.High, '2030-01-01'));
    appendTask(work, a);
    appendTask(work, b);

    const sorted = getSortedTasks(work);
    expect(sorted).toEqual([b, a]);
    expect(work.tasks).toEqual([a, b]);
  });
});
