/**
 * Issues and tracks one-shot completion signals
 */

import { randomBytes } from 'node:crypto';
import type { CompletionSignal, PaneAddress, SignalName } from '../types/pane.types.js';
import { formatPaneAddress, toSignalName } from '../types/pane.types.js';
import { SignalReuseError } from '../types/error.types.js';
import { createModuleLogger } from '@utils/logger';
import { isSafeSignalName } from '@utils/sanitize';

const logger = createModuleLogger('signal-registry');

export type SignalState = 'armed' | 'waiting' | 'signaled';

/**
 * Signal names are unique among outstanding signals so one task's emission
 * cannot wake another task's waiter. A signal is consumed by exactly one
 * wait; later emissions of the same name have no waiter and are dropped
 * (first emission wins).
 */
export class SignalRegistry {
  private outstandingSignals: Map<SignalName, { signal: CompletionSignal; state: SignalState }> = new Map();
  /** Held per signal object, so completed tasks leave nothing behind */
  private signaled: WeakSet<CompletionSignal> = new WeakSet();
  private seq = 0;

  constructor(private readonly prefix: string = 'pane-task') {}

  /**
   * Create a signal before dispatching the command that will emit it
   */
  arm(target: PaneAddress, options: { name?: string | undefined } = {}): CompletionSignal {
    const name = toSignalName(options.name ?? this.nextName());

    if (!isSafeSignalName(name) || this.outstandingSignals.has(name)) {
      logger.warn({ name, target: formatPaneAddress(target) }, 'Signal name unavailable');
      throw new SignalReuseError(target, name, 'arm-signal');
    }

    const signal: CompletionSignal = { name, target, createdAt: new Date() };
    this.outstandingSignals.set(name, { signal, state: 'armed' });
    logger.debug({ name, target: formatPaneAddress(target) }, 'Signal armed');
    return signal;
  }

  /**
   * Claim an armed signal for a waiter. Each signal admits one wait.
   */
  beginWait(signal: CompletionSignal): void {
    const entry = this.outstandingSignals.get(signal.name);
    if (!entry || entry.signal !== signal || entry.state !== 'armed') {
      throw new SignalReuseError(signal.target, signal.name, 'wait-signal');
    }
    entry.state = 'waiting';
  }

  /**
   * Armed/Waiting → Signaled
   */
  complete(signal: CompletionSignal): void {
    if (this.outstandingSignals.get(signal.name)?.signal === signal) {
      this.outstandingSignals.delete(signal.name);
      this.signaled.add(signal);
    }
  }

  /**
   * Drop a signal whose wait timed out, was cancelled or never started
   */
  abandon(signal: CompletionSignal): void {
    if (this.outstandingSignals.get(signal.name)?.signal === signal) {
      this.outstandingSignals.delete(signal.name);
      logger.debug({ name: signal.name }, 'Signal abandoned');
    }
  }

  state(signal: CompletionSignal): SignalState | undefined {
    const entry = this.outstandingSignals.get(signal.name);
    if (entry?.signal === signal) {
      return entry.state;
    }
    return this.signaled.has(signal) ? 'signaled' : undefined;
  }

  outstanding(): CompletionSignal[] {
    return Array.from(this.outstandingSignals.values(), (entry) => entry.signal);
  }

  private nextName(): string {
    this.seq++;
    return `${this.prefix}-${this.seq}-${randomBytes(4).toString('hex')}`;
  }
}
