/**
 * Builds the command tree evaluated for each shell line.
 * A fresh program per line keeps commander's parsed option values from carrying over.
 */

import { Command, CommanderError } from 'commander';
import { parseArgsStringToArgv } from 'string-argv';
import type { TaskManager } from '@task-forest/core';
import type { CliConfig } from './config.js';
import * as out from './output.js';

import { createCategoryCommand } from './commands/category.js';
import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand, createTreeCommand } from './commands/list.js';
import { createUndoCommand, createRedoCommand, createHistoryCommand } from './commands/undo.js';
import { createUrgentCommand } from './commands/urgent.js';

/** Never exit the process from inside the shell; route commander's own output through out */
function applyShellBehaviour(cmd: Command): void {
  cmd.exitOverride();
  cmd.configureOutput({
    writeOut: (str) => out.info(str.trimEnd()),
    writeErr: (str) => out.error(str.trimEnd()),
  });
  for (const sub of cmd.commands) {
    applyShellBehaviour(sub);
  }
}

export function createProgram(manager: TaskManager, config: CliConfig): Command {
  const program = new Command()
    .name('task-forest')
    .description('Hierarchical task manager')
    .usage('<command> [options]');

  // Register commands
  program.addCommand(createCategoryCommand(manager));
  program.addCommand(createAddCommand(manager, config));
  program.addCommand(createEditCommand(manager));
  program.addCommand(createDeleteCommand(manager));
  program.addCommand(createListCommand(manager));
  program.addCommand(createTreeCommand(manager));
  program.addCommand(createUndoCommand(manager));
  program.addCommand(createRedoCommand(manager));
  program.addCommand(createHistoryCommand(manager));
  program.addCommand(createUrgentCommand(manager, config));

  applyShellBehaviour(program);
  return program;
}

/** Split one line shell-style and run it against the manager */
export function runLine(manager: TaskManager, config: CliConfig, line: string): void {
  const argv = parseArgsStringToArgv(line);
  if (argv.length === 0) return;

  const program = createProgram(manager, config);
  try {
    program.parse(argv, { from: 'user' });
  } catch (err: unknown) {
    // Usage errors and help output were already written through configureOutput
    if (err instanceof CommanderError) {
      out.debug(`(${err.code})`);
      return;
    }
    throw err;
  }
}
