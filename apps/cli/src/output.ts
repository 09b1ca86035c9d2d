/**
 * chalk-based output formatting. Every line the shell prints goes through here.
 */

import chalk from 'chalk';
import { Priority, describeFailure, formatTaskWithId, isSuccess } from '@task-forest/core';
import type { DataResult, Failure, Task } from '@task-forest/core';

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Formatting functions ---

export function formatPriority(priority: number): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
    default: return chalk.dim('·  ');
  }
}

export function formatTaskLine(task: Task): string {
  return `${formatPriority(task.priority)} ${formatTaskWithId(task)}`;
}

// --- Result output ---

export function printFailure(failure: Failure): void {
  switch (failure.type) {
    case 'nothing-to-undo':
    case 'nothing-to-redo':
    case 'empty':
      warning(describeFailure(failure));
      break;
    default:
      error(describeFailure(failure));
  }
}

export function printResult<T, E extends Failure>(result: DataResult<T, E>): void {
  if (isSuccess(result)) {
    success(result.message);
  } else {
    printFailure(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.log(chalk.dim(message));
}

// --- Utilities ---

export function getTimeAgo(timestamp: string | Date, now: Date = new Date()): string {
  const time = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  const diff = now.getTime() - time.getTime();
  const mins = diff / 60000;
  if (mins < 1) return 'just now';
  if (mins < 60) return `${Math.floor(mins)}m ago`;
  const hours = mins / 60;
  if (hours < 24) return `${Math.floor(hours)}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}
