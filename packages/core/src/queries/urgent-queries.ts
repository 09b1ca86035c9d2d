/**
 * Urgent queue operations. Ids come from the same counter as regular tasks.
 */

import type { ForestStore } from '../forest/store.js';
import type { Category } from '../types/category.js';
import type { Task, TaskFields } from '../types/task.js';
import { createTask } from './task-queries.js';

export function enqueueUrgentTask(store: ForestStore, category: Category, fields: TaskFields): Task {
  const task = createTask(store, fields);
  category.urgentQueue.enqueue(task);
  return task;
}

export function dequeueUrgentTask(category: Category): Task | undefined {
  return category.urgentQueue.dequeue();
}

export function getUrgentTasks(category: Category): Task[] {
  return category.urgentQueue.toArray();
}
