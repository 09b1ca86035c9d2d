/**
 * Manages undo/redo stacks.
 * Two-stack architecture: every command undone moves to the redo stack and every
 * command redone moves back. Both arrays keep the most recent command last.
 */

import type { UndoCommand } from './undo-commands.js';
import { getCommandDescription } from './undo-commands.js';
import { executeCommand, undoCommand } from './undo-executor.js';
import type { DataResult, NothingToRedo, NothingToUndo } from '../types/results.js';
import { success } from '../types/results.js';

export interface UndoManagerOptions {
  /** Drop pending redo entries whenever a new command is recorded. Off by default. */
  clearRedoOnRecord?: boolean;
  /** Keep at most this many commands on each stack, discarding the oldest. Unbounded when unset. */
  historyLimit?: number;
}

export type UndoResult = DataResult<UndoCommand, NothingToUndo>;
export type RedoResult = DataResult<UndoCommand, NothingToRedo>;

export class UndoManager {
  private undoStack: UndoCommand[] = [];
  private redoStack: UndoCommand[] = [];
  private readonly clearRedoOnRecord: boolean;
  private readonly historyLimit: number | null;

  constructor(options: UndoManagerOptions = {}) {
    this.clearRedoOnRecord = options.clearRedoOnRecord ?? false;
    const limit = options.historyLimit;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`historyLimit must be a positive integer, got ${limit}`);
    }
    this.historyLimit = limit ?? null;
  }

  get canUndo(): boolean { return this.undoStack.length > 0; }
  get canRedo(): boolean { return this.redoStack.length > 0; }
  get undoCount(): number { return this.undoStack.length; }
  get redoCount(): number { return this.redoStack.length; }
  /** Undo stack, most recent first */
  get undoHistory(): readonly UndoCommand[] { return [...this.undoStack].reverse(); }
  /** Redo stack, most recent first */
  get redoHistory(): readonly UndoCommand[] { return [...this.redoStack].reverse(); }

  /** Record a command that has already been applied */
  recordCommand(command: UndoCommand): void {
    this.undoStack.push(command);
    if (this.clearRedoOnRecord) {
      this.redoStack = [];
    }
    this.enforceSizeLimit();
  }

  /** Undo the most recent command and move it to the redo stack */
  undo(): UndoResult {
    const cmd = this.undoStack.pop();
    if (!cmd) return { type: 'nothing-to-undo' };

    undoCommand(cmd);
    this.redoStack.push(cmd);
    this.enforceSizeLimit();

    return success(cmd, `Undone: ${getCommandDescription(cmd)}`);
  }

  /** Redo the most recently undone command and move it back to the undo stack */
  redo(): RedoResult {
    const cmd = this.redoStack.pop();
    if (!cmd) return { type: 'nothing-to-redo' };

    executeCommand(cmd);
    this.undoStack.push(cmd);
    this.enforceSizeLimit();

    return success(cmd, `Redone: ${getCommandDescription(cmd)}`);
  }

  /** Clear all undo/redo history */
  clearHistory(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  private enforceSizeLimit(): void {
    if (this.historyLimit === null) return;
    if (this.undoStack.length > this.historyLimit) {
      this.undoStack.splice(0, this.undoStack.length - this.historyLimit);
    }
    if (this.redoStack.length > this.historyLimit) {
      this.redoStack.splice(0, this.redoStack.length - this.historyLimit);
    }
  }
}
