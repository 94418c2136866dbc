/**
 * Configuration management
 */

import { z } from 'zod';

export const ConfigSchema = z.object({
  logLevel: z.enum(['silent', 'debug', 'info', 'warn', 'error']).default('info'),
  tmuxBinary: z.string().min(1).default('tmux'),
  captureLines: z.number().int().min(1).default(50),
  historyLimit: z.number().int().min(1000).default(50_000),
  stripAnsi: z.boolean().default(true),
  /** Refuse panes whose scrollback is below historyLimit instead of warning */
  enforceHistoryLimit: z.boolean().default(false),
  /** Set each registered pane's title to its role */
  titlePanes: z.boolean().default(true),
  pollIntervalMs: z.number().int().min(10).default(2000),
  quietSamplesRequired: z.number().int().min(1).default(2),
  maxPollSamples: z.number().int().min(1).default(150),
  signalTimeoutMs: z.number().int().positive().nullable().default(null),
  concurrentDispatch: z.enum(['serialize', 'reject']).default('serialize'),
  signalPrefix: z.string().regex(/^[A-Za-z0-9_-]+$/).default('pane-task'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Environment variables recognised by loadConfig, keyed by config field
 */
const ENV_KEYS = {
  logLevel: 'LOG_LEVEL',
  tmuxBinary: 'PANE_ORCH_TMUX_BINARY',
  captureLines: 'PANE_ORCH_CAPTURE_LINES',
  historyLimit: 'PANE_ORCH_HISTORY_LIMIT',
  stripAnsi: 'PANE_ORCH_STRIP_ANSI',
  enforceHistoryLimit: 'PANE_ORCH_ENFORCE_HISTORY_LIMIT',
  titlePanes: 'PANE_ORCH_TITLE_PANES',
  pollIntervalMs: 'PANE_ORCH_POLL_INTERVAL_MS',
  quietSamplesRequired: 'PANE_ORCH_QUIET_SAMPLES',
  maxPollSamples: 'PANE_ORCH_MAX_POLL_SAMPLES',
  signalTimeoutMs: 'PANE_ORCH_SIGNAL_TIMEOUT_MS',
  concurrentDispatch: 'PANE_ORCH_CONCURRENT_DISPATCH',
  signalPrefix: 'PANE_ORCH_SIGNAL_PREFIX',
} as const satisfies Record<keyof Config, string>;

const NUMERIC_KEYS: ReadonlySet<string> = new Set<keyof Config>([
  'captureLines',
  'historyLimit',
  'pollIntervalMs',
  'quietSamplesRequired',
  'maxPollSamples',
  'signalTimeoutMs',
]);

const BOOLEAN_KEYS: ReadonlySet<string> = new Set<keyof Config>([
  'stripAnsi',
  'enforceHistoryLimit',
  'titlePanes',
]);

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw === '') {
      continue;
    }

    if (BOOLEAN_KEYS.has(key)) {
      values[key] = raw === 'true' || raw === '1';
    } else if (NUMERIC_KEYS.has(key)) {
      values[key] = Number(raw);
    } else {
      values[key] = raw;
    }
  }

  return values;
}

/**
 * Build configuration from defaults, environment and explicit overrides.
 * Overrides win over the environment. Throws a ZodError on invalid values.
 */
export function loadConfig(overrides: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({ ...readEnv(env), ...overrides });
}
