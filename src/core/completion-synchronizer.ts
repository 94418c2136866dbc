/**
 * Completion Synchronizer
 *
 * Two interchangeable ways to learn that a pane finished its task:
 *
 * - signal-wait (Armed → Signaled): the dispatched command is chained with a
 *   `tmux wait-for -S <name>` suffix and the caller blocks on that channel.
 *   Precise, but only works when the command line cooperates.
 * - idle-poll (Busy → Idle): sample the recent output at a fixed interval
 *   and debounce a caller-supplied busy predicate. Works with any target
 *   at the cost of latency.
 *
 * Timeouts and poll exhaustion are recoverable: the caller can still
 * capture the pane manually. Cancelling a wait never touches the target.
 */

import type { MultiplexerBackend } from '../types/backend.types.js';
import type { CompletionSignal, OutputSnapshot, PaneAddress } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import {
  InjectionError,
  OrchestrationError,
  PollExhaustedError,
  SignalTimeoutError,
  WaitCancelledError,
} from '../types/error.types.js';
import { advanceIdleState, INITIAL_IDLE_STATE } from './idle-state.js';
import type { IdleState } from './idle-state.js';
import { CaptureWindows } from './output-observer.js';
import type { OutputObserver } from './output-observer.js';
import type { SignalRegistry } from './signal-registry.js';
import { createModuleLogger } from '@utils/logger';
import { systemScheduler } from '@utils/scheduler';
import type { Scheduler } from '@utils/scheduler';

const logger = createModuleLogger('completion-synchronizer');

export interface SignalWaitOptions {
  timeoutMs?: number | undefined;
  abortSignal?: AbortSignal | undefined;
}

export interface SignalWaitResult {
  signal: CompletionSignal;
  waitedMs: number;
}

export interface IdlePollOptions {
  isBusy: (snapshot: OutputSnapshot) => boolean;
  intervalMs?: number | undefined;
  maxSamples?: number | undefined;
  maxWaitMs?: number | undefined;
  quietSamplesRequired?: number | undefined;
  /** Lines of recent output per sample */
  lines?: number | undefined;
  abortSignal?: AbortSignal | undefined;
}

export interface IdlePollResult {
  snapshot: OutputSnapshot;
  samples: number;
  elapsedMs: number;
}

export interface SynchronizerDefaults {
  pollIntervalMs: number;
  quietSamplesRequired: number;
  maxPollSamples: number;
  captureLines: number;
}

const DEFAULTS: SynchronizerDefaults = {
  pollIntervalMs: 2000,
  quietSamplesRequired: 2,
  maxPollSamples: 150,
  captureLines: 50,
};

/** A list or pipeline operator, or a line continuation, left dangling at the end */
const DANGLING_OPERATOR = /(&&|\|\||\|&?|\\)$/;

/**
 * True when the command ends in an operator that expects more input, so no
 * suffix can follow it as a separate command
 */
export function isIncompleteCommand(commandText: string): boolean {
  return DANGLING_OPERATOR.test(commandText.replace(/[\s;]+$/, ''));
}

/**
 * Join a command and the signal emitter so the signal fires when the
 * command exits, whatever its status. Throws RangeError for a command that
 * ends in `&&`, `||`, `|` or `\`.
 */
export function chainCommand(commandText: string, suffix: string): string {
  const trimmed = commandText.replace(/[\s;]+$/, '');
  if (trimmed.length === 0) {
    return suffix;
  }
  if (DANGLING_OPERATOR.test(trimmed)) {
    throw new RangeError(`Command ends with an incomplete operator: ${trimmed.slice(-2).trim()}`);
  }
  // `cmd &` already terminates the list; `cmd &;` would be a syntax error
  const separator = /[^&]&$/.test(trimmed) ? ' ' : '; ';
  return `${trimmed}${separator}${suffix}`;
}

export class CompletionSynchronizer {
  private readonly defaults: SynchronizerDefaults;

  constructor(
    private readonly backend: MultiplexerBackend,
    private readonly observer: OutputObserver,
    private readonly signals: SignalRegistry,
    private readonly scheduler: Scheduler = systemScheduler,
    defaults: Partial<SynchronizerDefaults> = {}
  ) {
    this.defaults = { ...DEFAULTS, ...defaults };
  }

  /**
   * Create the signal for a task; do this before dispatching it
   */
  arm(target: PaneAddress, options: { name?: string | undefined } = {}): CompletionSignal {
    return this.signals.arm(target, options);
  }

  /**
   * Control suffix that emits the signal once the preceding command exits
   */
  signalSuffix(signal: CompletionSignal): string {
    return `; ${this.backend.signalCommand(signal.name)}`;
  }

  /**
   * Command text with the signal emitter chained after it
   */
  withSignal(commandText: string, signal: CompletionSignal): string {
    if (isIncompleteCommand(commandText)) {
      throw new InjectionError(
        `Command for ${formatPaneAddress(signal.target)} ends with an operator; the signal would never run`,
        signal.target,
        'incomplete-command',
        { signalName: signal.name }
      );
    }
    return chainCommand(commandText, this.backend.signalCommand(signal.name));
  }

  /**
   * Block until the signal fires, the timeout elapses or the wait is cancelled
   */
  async waitForSignal(signal: CompletionSignal, options: SignalWaitOptions = {}): Promise<SignalWaitResult> {
    const target = signal.target;
    const paneTarget = formatPaneAddress(target);
    const { timeoutMs, abortSignal } = options;

    this.signals.beginWait(signal);

    if (abortSignal?.aborted) {
      this.signals.abandon(signal);
      throw new WaitCancelledError(target, 'wait-signal', { signalName: signal.name });
    }

    logger.debug({ target: paneTarget, signal: signal.name, timeoutMs }, 'Waiting for signal');

    const startedAt = this.scheduler.now();
    const controller = new AbortController();
    const onAbort = (): void => {
      controller.abort(new WaitCancelledError(target, 'wait-signal', { signalName: signal.name }));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    const contenders: Array<Promise<'signaled' | 'timeout'>> = [
      this.backend
        .waitSignal(signal.name, { abortSignal: controller.signal })
        .then(() => 'signaled' as const),
    ];
    if (timeoutMs !== undefined) {
      contenders.push(this.scheduler.sleep(timeoutMs, controller.signal).then(() => 'timeout' as const));
    }

    try {
      const outcome = await Promise.race(contenders);
      const waitedMs = this.scheduler.now() - startedAt;

      if (outcome === 'timeout') {
        this.signals.abandon(signal);
        logger.warn({ target: paneTarget, signal: signal.name, timeoutMs }, 'Signal wait timed out');
        throw new SignalTimeoutError(target, signal.name, timeoutMs ?? waitedMs);
      }

      this.signals.complete(signal);
      logger.info({ target: paneTarget, signal: signal.name, waitedMs }, 'Signal received');
      return { signal, waitedMs };
    } catch (error) {
      if (error instanceof SignalTimeoutError) {
        throw error;
      }

      this.signals.abandon(signal);
      if (abortSignal?.aborted) {
        logger.info({ target: paneTarget, signal: signal.name }, 'Signal wait cancelled');
        throw new WaitCancelledError(target, 'wait-signal', { signalName: signal.name });
      }

      logger.error({ target: paneTarget, signal: signal.name, error }, 'Signal wait failed');
      throw new OrchestrationError(`Failed waiting for signal "${signal.name}"`, 'wait-signal', target, {
        signalName: signal.name,
        originalError: error,
      });
    } finally {
      abortSignal?.removeEventListener('abort', onAbort);
      // Stops whichever contender is still pending
      controller.abort();
    }
  }

  /**
   * Sample recent output until the busy predicate stays quiet long enough
   */
  async pollUntilIdle(target: PaneAddress, options: IdlePollOptions): Promise<IdlePollResult> {
    const paneTarget = formatPaneAddress(target);
    const intervalMs = options.intervalMs ?? this.defaults.pollIntervalMs;
    const maxSamples = options.maxSamples ?? this.defaults.maxPollSamples;
    const quietSamplesRequired = options.quietSamplesRequired ?? this.defaults.quietSamplesRequired;
    const window = CaptureWindows.recent(options.lines ?? this.defaults.captureLines);
    const { abortSignal, maxWaitMs } = options;

    logger.debug({ target: paneTarget, intervalMs, maxSamples, maxWaitMs }, 'Polling for idle');

    const startedAt = this.scheduler.now();
    let state: IdleState = INITIAL_IDLE_STATE;

    for (;;) {
      if (abortSignal?.aborted) {
        throw new WaitCancelledError(target, 'poll-idle', { samples: state.samples });
      }

      const snapshot = await this.observer.capture(target, window);
      state = advanceIdleState(state, options.isBusy(snapshot), quietSamplesRequired);
      const elapsedMs = this.scheduler.now() - startedAt;

      if (state.phase === 'idle') {
        logger.info({ target: paneTarget, samples: state.samples, elapsedMs }, 'Pane is idle');
        return { snapshot, samples: state.samples, elapsedMs };
      }

      if (state.samples >= maxSamples || (maxWaitMs !== undefined && elapsedMs >= maxWaitMs)) {
        logger.warn({ target: paneTarget, samples: state.samples, elapsedMs }, 'Idle poll exhausted');
        throw new PollExhaustedError(target, state.samples, elapsedMs, snapshot);
      }

      try {
        await this.scheduler.sleep(intervalMs, abortSignal);
      } catch (error) {
        if (abortSignal?.aborted) {
          logger.info({ target: paneTarget, samples: state.samples }, 'Idle poll cancelled');
          throw new WaitCancelledError(target, 'poll-idle', { samples: state.samples });
        }
        throw error;
      }
    }
  }
}
