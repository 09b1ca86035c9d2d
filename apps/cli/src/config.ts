/**
 * Shell configuration: command-line flags win over environment variables,
 * which win over defaults.
 */

import type { Priority as PriorityType, TaskManagerOptions } from '@task-forest/core';
import { Priority } from '@task-forest/core';
import { parsePriorityArg } from './helpers.js';

export interface CliConfig {
  readonly defaultPriority: PriorityType;
  readonly historyLimit: number | undefined;
  readonly clearRedoOnRecord: boolean;
  readonly verbose: boolean;
}

export interface CliFlags {
  defaultPriority?: string;
  historyLimit?: string;
  clearRedo?: boolean;
  verbose?: boolean;
}

export const ENV_DEFAULT_PRIORITY = 'TASK_FOREST_DEFAULT_PRIORITY';
export const ENV_HISTORY_LIMIT = 'TASK_FOREST_HISTORY_LIMIT';
export const ENV_CLEAR_REDO = 'TASK_FOREST_CLEAR_REDO';
export const ENV_VERBOSE = 'TASK_FOREST_VERBOSE';

export const DEFAULT_CONFIG: CliConfig = {
  defaultPriority: Priority.Medium,
  historyLimit: undefined,
  clearRedoOnRecord: false,
  verbose: false,
};

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  switch (value.toLowerCase()) {
    case '1': case 'true': case 'yes': case 'on': return true;
    case '0': case 'false': case 'no': case 'off': return false;
    default: throw new Error(`Expected a boolean value, got '${value}'`);
  }
}

function parseLimit(value: string | undefined, source: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`${source} must be a positive integer, got '${value}'`);
  }
  return Number(value);
}

function parseDefaultPriority(value: string | undefined, source: string): PriorityType | undefined {
  if (value === undefined || value === '') return undefined;
  const priority = parsePriorityArg(value);
  if (priority === null) {
    throw new Error(`${source} must be 1-3 or high/medium/low, got '${value}'`);
  }
  return priority;
}

/** Merge flags, environment and defaults. Throws on malformed values. */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    defaultPriority:
      parseDefaultPriority(flags.defaultPriority, '--default-priority')
      ?? parseDefaultPriority(env[ENV_DEFAULT_PRIORITY], ENV_DEFAULT_PRIORITY)
      ?? DEFAULT_CONFIG.defaultPriority,
    historyLimit:
      parseLimit(flags.historyLimit, '--history-limit')
      ?? parseLimit(env[ENV_HISTORY_LIMIT], ENV_HISTORY_LIMIT)
      ?? DEFAULT_CONFIG.historyLimit,
    clearRedoOnRecord: flags.clearRedo ?? parseBoolean(env[ENV_CLEAR_REDO]) ?? DEFAULT_CONFIG.clearRedoOnRecord,
    verbose: flags.verbose ?? parseBoolean(env[ENV_VERBOSE]) ?? DEFAULT_CONFIG.verbose,
  };
}

export function toManagerOptions(config: CliConfig): TaskManagerOptions {
  return {
    clearRedoOnRecord: config.clearRedoOnRecord,
    historyLimit: config.historyLimit,
  };
}
