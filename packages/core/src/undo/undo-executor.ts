/**
 * Executes undo/redo operations by dispatching command types to the task queries.
 */

import type { UndoCommand } from './undo-commands.js';
import { appendTask, assignFields, detachTask } from '../queries/task-queries.js';

/** Execute a command (for redo) */
export function executeCommand(cmd: UndoCommand): void {
  switch (cmd.$type) {
    case 'add':
      appendTask(cmd.category, cmd.task);
      break;
    case 'remove':
      detachTask(cmd.category, cmd.task);
      break;
    case 'modify':
      assignFields(cmd.task, cmd.after);
      break;
  }
}

/** Undo a command (reverse the operation) */
export function undoCommand(cmd: UndoCommand): void {
  switch (cmd.$type) {
    case 'add':
      detachTask(cmd.category, cmd.task);
      break;
    case 'remove':
      // Goes back at the end, not at its old index
      appendTask(cmd.category, cmd.task);
      break;
    case 'modify':
      assignFields(cmd.task, cmd.before);
      break;
  }
}
