/**
 * Undo command types as a discriminated union.
 * Each command references the live task and category it touched, so reversing it
 * works on the same objects the forest still holds.
 */

import type { Category } from '../types/category.js';
import type { Task, TaskFields } from '../types/task.js';

interface BaseCommand {
  readonly executedAt: string; // ISO string
  readonly category: Category;
}

export interface AddTaskCmd extends BaseCommand {
  readonly $type: 'add';
  readonly task: Task;
}

export interface RemoveTaskCmd extends BaseCommand {
  readonly $type: 'remove';
  readonly task: Task;
}

export interface ModifyTaskCmd extends BaseCommand {
  readonly $type: 'modify';
  readonly task: Task;
  readonly before: Readonly<TaskFields>;
  readonly after: Readonly<TaskFields>;
}

export type UndoCommand = AddTaskCmd | RemoveTaskCmd | ModifyTaskCmd;

/** Get a human-readable description of an undo command */
export function getCommandDescription(cmd: UndoCommand): string {
  switch (cmd.$type) {
    case 'add': return `Add: ${cmd.task.title.slice(0, 30)} to ${cmd.category.name}`;
    case 'remove': return `Remove: ${cmd.task.title.slice(0, 30)} from ${cmd.category.name}`;
    case 'modify':
      return cmd.before.title === cmd.after.title
        ? `Modify: ${cmd.after.title.slice(0, 30)}`
        : `Modify: ${cmd.before.title.slice(0, 30)} → ${cmd.after.title.slice(0, 30)}`;
  }
}
