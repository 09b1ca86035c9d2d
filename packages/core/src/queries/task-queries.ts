/**
 * Operations on a category's direct task list. None of these record history;
 * the task manager and the undo executor decide when to call them.
 */

import type { ForestStore } from '../forest/store.js';
import { allocateTaskId } from '../forest/store.js';
import type { Category } from '../types/category.js';
import type { Task, TaskFields, TaskId } from '../types/task.js';

/** Build a task with the next id from the store's counter */
export function createTask(store: ForestStore, fields: TaskFields): Task {
  return {
    id: allocateTaskId(store),
    title: fields.title,
    description: fields.description,
    priority: fields.priority,
    dueDate: fields.dueDate,
  };
}

export function findTask(category: Category, taskId: TaskId): Task | undefined {
  return category.tasks.find(t => t.id === taskId);
}

/** Append a task at the end of the list. A task already in the list is left where it is. */
export function appendTask(category: Category, task: Task): boolean {
  if (category.tasks.includes(task)) return false;
  category.tasks.push(task);
  return true;
}

/** Remove the given task object (by identity). Returns false when it is not in the list. */
export function detachTask(category: Category, task: Task): boolean {
  const index = category.tasks.indexOf(task);
  if (index < 0) return false;
  category.tasks.splice(index, 1);
  return true;
}

/** Immutable copy of the four replaceable fields */
export function snapshotFields(task: TaskFields): Readonly<TaskFields> {
  return Object.freeze({
    title: task.title,
    description: task.description,
    priority: task.priority,
    dueDate: task.dueDate,
  });
}

/** Overwrite all four fields of a live task */
export function assignFields(task: Task, fields: Readonly<TaskFields>): void {
  task.title = fields.title;
  task.description = fields.description;
  task.priority = fields.priority;
  task.dueDate = fields.dueDate;
}

/** Ascending by priority, then due date; equal keys keep list order */
export function compareByPriorityAndDue(a: TaskFields, b: TaskFields): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.dueDate < b.dueDate) return -1;
  if (a.dueDate > b.dueDate) return 1;
  return 0;
}

/** Sorted copy of a category's direct tasks; subcategories are not included */
export function getSortedTasks(category: Category): Task[] {
  return [...category.tasks].sort(compareByPriorityAndDue);
}
