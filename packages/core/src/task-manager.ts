/**
 * Entry point for callers: resolves categories by name, applies mutations and
 * records them in the undo history within the same call.
 */

import type { ForestStore } from './forest/store.js';
import { createStore } from './forest/store.js';
import type { Category } from './types/category.js';
import type { CategoryName, Task, TaskFields, TaskId } from './types/task.js';
import type {
  AlreadyExists, CategoryNotFound, DataResult, ParentNotFound, QueueEmpty, TaskNotFound,
} from './types/results.js';
import { success } from './types/results.js';
import type { CategoryLookup } from './queries/category-queries.js';
import {
  categoryExists, countCategories, createRootCategory, createSubcategory, findCategory, findCategoryByName,
} from './queries/category-queries.js';
import {
  appendTask, assignFields, createTask, detachTask, findTask, getSortedTasks, snapshotFields,
} from './queries/task-queries.js';
import { dequeueUrgentTask, enqueueUrgentTask, getUrgentTasks } from './queries/urgent-queries.js';
import type { RedoResult, UndoManagerOptions, UndoResult } from './undo/undo-manager.js';
import { UndoManager } from './undo/undo-manager.js';
import { renderTree } from './render/tree-renderer.js';

export type TaskManagerOptions = UndoManagerOptions;

export class TaskManager {
  readonly store: ForestStore;
  readonly history: UndoManager;

  constructor(options: TaskManagerOptions = {}) {
    this.store = createStore();
    this.history = new UndoManager(options);
  }

  get categories(): readonly Category[] {
    return this.store.categories;
  }

  /** Every category node, subcategories included */
  get categoryCount(): number {
    return countCategories(this.store);
  }

  findCategory(lookup: CategoryLookup): Category | undefined {
    return findCategory(this.store, lookup);
  }

  // --- Categories ---

  addCategory(name: CategoryName): DataResult<Category, AlreadyExists> {
    if (categoryExists(this.store, name)) {
      return { type: 'already-exists', categoryName: name };
    }
    const category = createRootCategory(this.store, name);
    return success(category, `Category '${name}' added`);
  }

  addSubcategory(name: CategoryName, parentName: CategoryName): DataResult<Category, ParentNotFound> {
    const parent = findCategoryByName(this.store, parentName);
    if (!parent) {
      return { type: 'parent-not-found', parentName };
    }
    const category = createSubcategory(this.store, parent, name);
    return success(category, `Subcategory '${name}' added to '${parentName}'`);
  }

  // --- Tasks ---

  getTask(taskId: TaskId, categoryName: CategoryName): DataResult<Task, CategoryNotFound | TaskNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = findTask(category, taskId);
    if (!task) return { type: 'task-not-found', taskId };

    return success(task, `Found task ${taskId}`);
  }

  addTask(fields: TaskFields, categoryName: CategoryName): DataResult<Task, CategoryNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = createTask(this.store, fields);
    appendTask(category, task);
    this.history.recordCommand({
      $type: 'add',
      task,
      category,
      executedAt: new Date().toISOString(),
    });

    return success(task, `Task '${task.title}' added to '${categoryName}'`);
  }

  removeTask(taskId: TaskId, categoryName: CategoryName): DataResult<Task, CategoryNotFound | TaskNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = findTask(category, taskId);
    if (!task) return { type: 'task-not-found', taskId };

    detachTask(category, task);
    this.history.recordCommand({
      $type: 'remove',
      task,
      category,
      executedAt: new Date().toISOString(),
    });

    return success(task, `Task ${taskId} removed`);
  }

  modifyTask(
    taskId: TaskId,
    fields: TaskFields,
    categoryName: CategoryName,
  ): DataResult<Task, CategoryNotFound | TaskNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = findTask(category, taskId);
    if (!task) return { type: 'task-not-found', taskId };

    const before = snapshotFields(task);
    assignFields(task, fields);
    const after = snapshotFields(task);
    this.history.recordCommand({
      $type: 'modify',
      task,
      before,
      after,
      category,
      executedAt: new Date().toISOString(),
    });

    return success(task, `Task '${task.title}' modified`);
  }

  listSorted(categoryName: CategoryName): DataResult<Task[], CategoryNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const tasks = getSortedTasks(category);
    return success(tasks, `${tasks.length} task(s) in '${categoryName}'`);
  }

  renderTree(): string[] {
    return renderTree(this.store);
  }

  // --- History ---

  undo(): UndoResult {
    return this.history.undo();
  }

  redo(): RedoResult {
    return this.history.redo();
  }

  // --- Urgent queue ---

  enqueueUrgent(fields: TaskFields, categoryName: CategoryName): DataResult<Task, CategoryNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = enqueueUrgentTask(this.store, category, fields);
    return success(task, `Urgent task '${task.title}' queued in '${categoryName}'`);
  }

  dequeueUrgent(categoryName: CategoryName): DataResult<Task, CategoryNotFound | QueueEmpty> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const task = dequeueUrgentTask(category);
    if (!task) return { type: 'empty', categoryName };

    return success(task, `Processing urgent task '${task.title}'`);
  }

  peekAllUrgent(categoryName: CategoryName): DataResult<Task[], CategoryNotFound> {
    const category = findCategoryByName(this.store, categoryName);
    if (!category) return { type: 'category-not-found', categoryName };

    const tasks = getUrgentTasks(category);
    return success(tasks, `${tasks.length} urgent task(s) in '${categoryName}'`);
  }
}
