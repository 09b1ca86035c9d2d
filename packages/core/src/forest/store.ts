/**
 * In-memory forest of categories plus the id counters that name its nodes and tasks.
 * Counters start at 1 and only ever grow; removed tasks never give their id back.
 */

import type { Category } from '../types/category.js';
import type { CategoryId, CategoryName, TaskId } from '../types/task.js';
import { UrgentQueue } from '../queue/urgent-queue.js';

export interface ForestStore {
  readonly categories: Category[];
  nextCategoryId: CategoryId;
  nextTaskId: TaskId;
}

export function createStore(): ForestStore {
  return {
    categories: [],
    nextCategoryId: 1,
    nextTaskId: 1,
  };
}

export function allocateCategoryId(store: ForestStore): CategoryId {
  return store.nextCategoryId++;
}

export function allocateTaskId(store: ForestStore): TaskId {
  return store.nextTaskId++;
}

/** Build a detached category node; the caller decides where it hangs */
export function createCategory(id: CategoryId, name: CategoryName): Category {
  return {
    id,
    name,
    tasks: [],
    subcategories: [],
    urgentQueue: new UrgentQueue(),
  };
}
