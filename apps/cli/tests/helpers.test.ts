import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Priority } from '@task-forest/core';
import type { TaskFields } from '@task-forest/core';
import {
  parsePriorityArg,
  parseTaskId,
  requireTaskId,
  isValidCategoryName,
  buildTaskFields,
  UsageError,
  $try,
} from '../src/helpers.js';

const base: TaskFields = {
  title: 'Report',
  description: 'Q3',
  priority: Priority.Medium,
  dueDate: '2030-01-01',
};

describe('parsePriorityArg', () => {
  it('parses numbers, names and p-prefixed levels', () => {
    expect(parsePriorityArg('1')).toBe(Priority.High);
    expect(parsePriorityArg('HIGH')).toBe(Priority.High);
    expect(parsePriorityArg('p2')).toBe(Priority.Medium);
    expect(parsePriorityArg('medium')).toBe(Priority.Medium);
    expect(parsePriorityArg(' low ')).toBe(Priority.Low);
    expect(parsePriorityArg('3')).toBe(Priority.Low);
  });

  it('returns null for anything out of range', () => {
    expect(parsePriorityArg('0')).toBeNull();
    expect(parsePriorityArg('4')).toBeNull();
    expect(parsePriorityArg('urgent')).toBeNull();
    expect(parsePriorityArg('p0')).toBeNull();
    expect(parsePriorityArg('p')).toBeNull();
    expect(parsePriorityArg('1.5')).toBeNull();
  });

  it('accepts numeric levels with leading zeros', () => {
    expect(parsePriorityArg('01')).toBe(Priority.High);
    expect(parsePriorityArg('P03')).toBe(Priority.Low);
  });
});

describe('parseTaskId', () => {
  it('accepts positive integers only', () => {
    expect(parseTaskId('7')).toBe(7);
    expect(parseTaskId(' 12 ')).toBe(12);
    expect(parseTaskId('0')).toBeNull();
    expect(parseTaskId('-1')).toBeNull();
    expect(parseTaskId('1.5')).toBeNull();
    expect(parseTaskId('abc')).toBeNull();
  });

  it('requireTaskId throws a UsageError on bad input', () => {
    expect(requireTaskId('3')).toBe(3);
    expect(() => requireTaskId('x')).toThrow(UsageError);
    expect(() => requireTaskId('x')).toThrow("Task id must be a positive number, got 'x'");
  });
});

describe('isValidCategoryName', () => {
  it('rejects blank names', () => {
    expect(isValidCategoryName('Work')).toBe(true);
    expect(isValidCategoryName('')).toBe(false);
    expect(isValidCategoryName('   ')).toBe(false);
  });
});

describe('buildTaskFields', () => {
  it('keeps base values for options not given', () => {
    expect(buildTaskFields({}, base)).toEqual(base);
  });

  it('applies given options', () => {
    const fields = buildTaskFields(
      { title: '  Summary ', description: '', priority: 'high', due: '31/12/2030' },
      base,
    );
    expect(fields).toEqual({ title: 'Summary', description: '', priority: Priority.High, dueDate: '2030-12-31' });
  });

  it('resolves relative dates against now', () => {
    const fields = buildTaskFields({ due: 'tomorrow' }, base, new Date(2026, 1, 8));
    expect(fields.dueDate).toBe('2026-02-09');
  });

  it('rejects an empty title, a bad priority and a bad date', () => {
    expect(() => buildTaskFields({ title: '  ' }, base)).toThrow('Title must not be empty');
    expect(() => buildTaskFields({ priority: '9' }, base))
      .toThrow("Invalid priority '9'. Use 1, 2 or 3 (high, medium, low).");
    expect(() => buildTaskFields({ due: '32/01/2030' }, base)).toThrow("Invalid date '32/01/2030'. Use DD/MM/YYYY.");
  });
});

describe('$try', () => {
  let savedLevel: typeof chalk.level;

  beforeEach(() => {
    savedLevel = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    chalk.level = savedLevel;
  });

  it('runs the function normally', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(console.log).not.toHaveBeenCalled();
  });

  it('prints thrown errors instead of propagating them', () => {
    $try(() => { throw new Error('boom'); });
    expect(console.log).toHaveBeenCalledWith('boom');
  });

  it('prints non-Error throwables as strings', () => {
    $try(() => { throw 'plain'; });
    expect(console.log).toHaveBeenCalledWith('plain');
  });
});
