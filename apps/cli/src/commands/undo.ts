import { Command } from 'commander';
import chalk from 'chalk';
import type { TaskManager, UndoCommand } from '@task-forest/core';
import { getCommandDescription } from '@task-forest/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

const SHOWN_ENTRIES = 10;

export function createUndoCommand(manager: TaskManager): Command {
  return new Command('undo')
    .description('Undo the last add, delete or edit')
    .action(() => $try(() => {
      out.printResult(manager.undo());
    }));
}

export function createRedoCommand(manager: TaskManager): Command {
  return new Command('redo')
    .description('Redo the last undone action')
    .action(() => $try(() => {
      out.printResult(manager.redo());
    }));
}

function printStack(title: string, commands: readonly UndoCommand[]): void {
  console.log(`${chalk.bold(title)} ${chalk.dim(`(${commands.length} actions)`)}`);
  for (const cmd of commands.slice(0, SHOWN_ENTRIES)) {
    console.log(`  ${chalk.dim(out.getTimeAgo(cmd.executedAt))} ${getCommandDescription(cmd)}`);
  }
  if (commands.length > SHOWN_ENTRIES) {
    console.log(chalk.dim(`  ... and ${commands.length - SHOWN_ENTRIES} more`));
  }
}

export function createHistoryCommand(manager: TaskManager): Command {
  return new Command('history')
    .description('Show undo/redo history')
    .option('-c, --clear', 'Clear all undo/redo history')
    .action((opts: { clear?: boolean }) => $try(() => {
      const history = manager.history;
      if (opts.clear) {
        history.clearHistory();
        out.success('Undo/redo history cleared');
        return;
      }

      if (!history.canUndo && !history.canRedo) {
        out.info('No history');
        return;
      }

      if (history.canUndo) printStack('Undo stack', history.undoHistory);
      if (history.canRedo) printStack('Redo stack', history.redoHistory);
    }));
}
