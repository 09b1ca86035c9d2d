#!/usr/bin/env node

import { Command } from 'commander';
import { TaskManager } from '@task-forest/core';
import type { CliConfig, CliFlags } from './config.js';
import { resolveConfig, toManagerOptions } from './config.js';
import * as out from './output.js';
import { startShell } from './shell.js';

function loadConfig(flags: CliFlags): CliConfig | null {
  try {
    return resolveConfig(flags);
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return null;
  }
}

const program = new Command()
  .name('task-forest')
  .description('Interactive hierarchical task manager (state lives for the session only)')
  .version('1.0.0')
  .option('-p, --default-priority <level>', 'Priority for tasks added without -p (1-3 or high/medium/low)')
  .option('--history-limit <count>', 'Keep at most this many undo/redo entries')
  .option('--clear-redo', 'Discard redo entries when a new action is recorded')
  .option('--verbose', 'Print extra diagnostics')
  .action(async (flags: CliFlags) => {
    const config = loadConfig(flags);
    if (!config) {
      process.exitCode = 1;
      return;
    }

    out.setVerbose(config.verbose);
    out.debug(`Config: ${JSON.stringify(config)}`);

    const manager = new TaskManager(toManagerOptions(config));
    await startShell(manager, config);
  });

await program.parseAsync();
