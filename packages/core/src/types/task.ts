import type { Priority } from './priority.js';

export type TaskId = number;
export type CategoryId = number;
export type CategoryName = string;

/** The four fields a modification replaces together */
export interface TaskFields {
  title: string;
  description: string;
  priority: Priority;
  dueDate: string; // yyyy-MM-dd
}

export interface Task extends TaskFields {
  readonly id: TaskId;
}
