export { UndoManager } from './undo-manager.js';
export type { UndoManagerOptions, UndoResult, RedoResult } from './undo-manager.js';
export { getCommandDescription } from './undo-commands.js';
export { executeCommand, undoCommand } from './undo-executor.js';
export type {
  UndoCommand,
  AddTaskCmd,
  RemoveTaskCmd,
  ModifyTaskCmd,
} from './undo-commands.js';
