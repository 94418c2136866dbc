/**
 * Per-pane mutual exclusion for dispatch-through-wait
 */

import type { PaneAddress } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import { ConcurrentDispatchViolationError } from '../types/error.types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('pane-lock');

export type LockPolicy = 'serialize' | 'reject';

export interface PaneLease {
  readonly target: PaneAddress;
  readonly owner: string;
  readonly acquiredAt: Date;
  /** Idempotent */
  release(): void;
}

interface LockState {
  owner: string | undefined;
  /** Resolves when the most recently queued holder releases */
  tail: Promise<void>;
  waiting: number;
}

/**
 * Input from two tasks must never interleave on the same pane. Under
 * `serialize` acquirers queue in FIFO order; under `reject` a second
 * acquirer fails with ConcurrentDispatchViolationError.
 */
export class PaneLockManager {
  private locks: Map<string, LockState> = new Map();

  constructor(private readonly policy: LockPolicy = 'serialize') {}

  async acquire(target: PaneAddress, owner: string): Promise<PaneLease> {
    const key = formatPaneAddress(target);
    const state = this.locks.get(key) ?? { owner: undefined, tail: Promise.resolve(), waiting: 0 };

    const busy = state.owner !== undefined || state.waiting > 0;
    if (busy && this.policy === 'reject') {
      logger.warn({ target: key, heldBy: state.owner, attemptedBy: owner }, 'Concurrent dispatch rejected');
      throw new ConcurrentDispatchViolationError(target, state.owner ?? 'queued task', owner);
    }

    let releaseGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseGate = resolve;
    });

    const previous = state.tail;
    state.tail = previous.then(() => gate);
    state.waiting++;
    this.locks.set(key, state);

    if (busy) {
      logger.debug({ target: key, heldBy: state.owner, owner }, 'Waiting for pane lock');
    }

    await previous;
    state.waiting--;
    state.owner = owner;
    logger.debug({ target: key, owner }, 'Pane lock acquired');

    let released = false;
    return {
      target,
      owner,
      acquiredAt: new Date(),
      release: () => {
        if (released) {
          return;
        }
        released = true;
        state.owner = undefined;
        if (state.waiting === 0) {
          this.locks.delete(key);
        }
        logger.debug({ target: key, owner }, 'Pane lock released');
        releaseGate();
      },
    };
  }

  isLocked(target: PaneAddress): boolean {
    return this.locks.get(formatPaneAddress(target))?.owner !== undefined;
  }

  getHolder(target: PaneAddress): string | undefined {
    return this.locks.get(formatPaneAddress(target))?.owner;
  }
}
