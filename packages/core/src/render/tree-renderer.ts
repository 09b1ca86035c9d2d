/**
 * Plain-text rendering of tasks and the category forest.
 * Produces lines; printing them is the caller's business.
 */

import type { ForestStore } from '../forest/store.js';
import type { Category } from '../types/category.js';
import type { Task } from '../types/task.js';
import { formatDisplayDate } from '../parsers/date-parser.js';

const INDENT = '  ';

function pad(level: number): string {
  return INDENT.repeat(level);
}

/** "<title> - <description> - Priority: <p> - Due: <DD/MM/YYYY>" */
export function formatTask(task: Task): string {
  return `${task.title} - ${task.description} - Priority: ${task.priority} - Due: ${formatDisplayDate(task.dueDate)}`;
}

/** Same as formatTask, prefixed with the task id */
export function formatTaskWithId(task: Task): string {
  return `ID: ${task.id} - ${formatTask(task)}`;
}

function renderTasks(category: Category, level: number, lines: string[]): void {
  if (category.tasks.length === 0) {
    lines.push(`${pad(level)}No tasks in ${category.name}.`);
    return;
  }
  lines.push(`${pad(level)}Tasks in ${category.name}:`);
  for (const task of category.tasks) {
    lines.push(`${pad(level + 2)}* ${formatTaskWithId(task)}`);
  }
}

function renderSubcategories(category: Category, level: number, lines: string[]): void {
  for (const sub of category.subcategories) {
    lines.push(`${pad(level)}- Subcategory: ${sub.name}`);
    renderTasks(sub, level + 1, lines);
    renderSubcategories(sub, level + 1, lines);
  }
}

/** Every category with its direct tasks, pre-order, children indented under their parent */
export function renderTree(store: ForestStore): string[] {
  if (store.categories.length === 0) {
    return ['No categories available.'];
  }

  const lines: string[] = [];
  for (const root of store.categories) {
    lines.push(`Category: ${root.name}`);
    renderTasks(root, 0, lines);
    renderSubcategories(root, 1, lines);
  }
  return lines;
}
