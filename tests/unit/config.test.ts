/**
 * Unit tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '@utils/config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      logLevel: 'info',
      tmuxBinary: 'tmux',
      captureLines: 50,
      historyLimit: 50000,
      stripAnsi: true,
      enforceHistoryLimit: false,
      titlePanes: true,
      pollIntervalMs: 2000,
      quietSamplesRequired: 2,
      maxPollSamples: 150,
      signalTimeoutMs: null,
      concurrentDispatch: 'serialize',
      signalPrefix: 'pane-task',
    });
  });

  it('should read the environment', () => {
    const config = loadConfig({}, {
      LOG_LEVEL: 'debug',
      PANE_ORCH_TMUX_BINARY: '/usr/local/bin/tmux',
      PANE_ORCH_POLL_INTERVAL_MS: '500',
      PANE_ORCH_STRIP_ANSI: 'false',
      PANE_ORCH_SIGNAL_TIMEOUT_MS: '30000',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.tmuxBinary).toBe('/usr/local/bin/tmux');
    expect(config.pollIntervalMs).toBe(500);
    expect(config.stripAnsi).toBe(false);
    expect(config.signalTimeoutMs).toBe(30000);
  });

  it('should accept 1 as true for flags', () => {
    expect(loadConfig({}, { PANE_ORCH_STRIP_ANSI: '1' }).stripAnsi).toBe(true);
  });

  it('should read the scrollback and title flags', () => {
    const config = loadConfig({}, { PANE_ORCH_ENFORCE_HISTORY_LIMIT: 'true', PANE_ORCH_TITLE_PANES: '0' });

    expect(config.enforceHistoryLimit).toBe(true);
    expect(config.titlePanes).toBe(false);
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({}, { PANE_ORCH_CAPTURE_LINES: '' }).captureLines).toBe(50);
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig({ captureLines: 10 }, { PANE_ORCH_CAPTURE_LINES: '200' });
    expect(config.captureLines).toBe(10);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({}, { PANE_ORCH_POLL_INTERVAL_MS: 'soon' })).toThrow(ZodError);
    expect(() => loadConfig({ historyLimit: 10 }, {})).toThrow(ZodError);
    expect(() => loadConfig({}, { PANE_ORCH_CONCURRENT_DISPATCH: 'queue' })).toThrow(ZodError);
  });
});
