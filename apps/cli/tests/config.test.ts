import { describe, it, expect } from 'vitest';
import { Priority } from '@task-forest/core';
import {
  resolveConfig,
  toManagerOptions,
  DEFAULT_CONFIG,
  ENV_CLEAR_REDO,
  ENV_DEFAULT_PRIORITY,
  ENV_HISTORY_LIMIT,
  ENV_VERBOSE,
} from '../src/config.js';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads environment variables', () => {
    const config = resolveConfig({}, {
      [ENV_DEFAULT_PRIORITY]: 'high',
      [ENV_HISTORY_LIMIT]: '20',
      [ENV_CLEAR_REDO]: 'yes',
      [ENV_VERBOSE]: '1',
    });
    expect(config).toEqual({
      defaultPriority: Priority.High,
      historyLimit: 20,
      clearRedoOnRecord: true,
      verbose: true,
    });
  });

  it('lets flags win over the environment', () => {
    const config = resolveConfig(
      { defaultPriority: '3', historyLimit: '5', clearRedo: false, verbose: false },
      { [ENV_DEFAULT_PRIORITY]: '1', [ENV_HISTORY_LIMIT]: '50', [ENV_CLEAR_REDO]: 'true', [ENV_VERBOSE]: 'true' },
    );
    expect(config).toEqual({
      defaultPriority: Priority.Low,
      historyLimit: 5,
      clearRedoOnRecord: false,
      verbose: false,
    });
  });

  it('treats empty environment values as unset', () => {
    expect(resolveConfig({}, { [ENV_HISTORY_LIMIT]: '', [ENV_VERBOSE]: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects malformed values with the offending source in the message', () => {
    expect(() => resolveConfig({ historyLimit: '0' }, {}))
      .toThrow("--history-limit must be a positive integer, got '0'");
    expect(() => resolveConfig({}, { [ENV_DEFAULT_PRIORITY]: 'urgent' }))
      .toThrow("TASK_FOREST_DEFAULT_PRIORITY must be 1-3 or high/medium/low, got 'urgent'");
    expect(() => resolveConfig({}, { [ENV_CLEAR_REDO]: 'maybe' }))
      .toThrow("Expected a boolean value, got 'maybe'");
  });
});

describe('toManagerOptions', () => {
  it('passes the history settings through', () => {
    expect(toManagerOptions({ ...DEFAULT_CONFIG, historyLimit: 3, clearRedoOnRecord: true }))
      .toEqual({ historyLimit: 3, clearRedoOnRecord: true });
  });
});
