/**
 * CLI helpers: argument parsing and error handling.
 */

import type { Priority as PriorityType, TaskFields, TaskId } from '@task-forest/core';
import { Priority, isPriority, parseDate } from '@task-forest/core';
import * as out from './output.js';

/** Raised for bad user input; $try prints its message */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse a priority string into a Priority value, or null if unrecognized.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  const normalized = level.trim().toLowerCase();

  const numeric = /^p?(\d+)$/.exec(normalized);
  if (numeric) {
    const value = Number(numeric[1]);
    return isPriority(value) ? value : null;
  }

  switch (normalized) {
    case 'high': return Priority.High;
    case 'medium': return Priority.Medium;
    case 'low': return Priority.Low;
    default: return null;
  }
}

/**
 * Parse a task id argument. Only positive integers are ids.
 */
export function parseTaskId(value: string): TaskId | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const id = Number(trimmed);
  return id > 0 ? id : null;
}

export function requireTaskId(value: string): TaskId {
  const id = parseTaskId(value);
  if (id === null) throw new UsageError(`Task id must be a positive number, got '${value}'`);
  return id;
}

export function isValidCategoryName(name: string): boolean {
  return name.trim().length > 0;
}

export interface TaskOptions {
  title?: string;
  description?: string;
  priority?: string;
  due?: string;
}

/**
 * Fill in task fields from command options, falling back to base for anything not given.
 * Throws UsageError on an empty title, an unknown priority or an unparseable date.
 */
export function buildTaskFields(opts: TaskOptions, base: TaskFields, now?: Date): TaskFields {
  const title = opts.title ?? base.title;
  if (!title.trim()) throw new UsageError('Title must not be empty');

  let priority = base.priority;
  if (opts.priority !== undefined) {
    const parsed = parsePriorityArg(opts.priority);
    if (parsed === null) {
      throw new UsageError(`Invalid priority '${opts.priority}'. Use 1, 2 or 3 (high, medium, low).`);
    }
    priority = parsed;
  }

  let dueDate = base.dueDate;
  if (opts.due !== undefined) {
    const parsed = parseDate(opts.due, now);
    if (parsed === null) {
      throw new UsageError(`Invalid date '${opts.due}'. Use DD/MM/YYYY.`);
    }
    dueDate = parsed;
  }

  return {
    title: title.trim(),
    description: opts.description ?? base.description,
    priority,
    dueDate,
  };
}

/**
 * Run a command body, printing any thrown error instead of propagating it.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}
