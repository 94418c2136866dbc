/**
 * Command dispatch into panes
 */

import type { MultiplexerBackend } from '../types/backend.types.js';
import type { CommandPayload, InjectionStep, PaneAddress } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import { InjectionError } from '../types/error.types.js';
import { encodePayload } from './command-encoder.js';
import type { PaneLease, PaneLockManager } from './pane-lock.js';
import { createModuleLogger } from '@utils/logger';
import { isMissingTargetError } from '@utils/tmux-utils';

const logger = createModuleLogger('command-injector');

export interface DispatchOptions {
  /** Lease already held by the caller for this target (dispatch-through-wait) */
  lease?: PaneLease | undefined;
  /** Label recorded as the lock owner */
  owner?: string | undefined;
}

/**
 * Sends payloads to panes. Has no view of whether the pane's foreground
 * process is ready for input; callers synchronize before dispatching.
 */
export class CommandInjector {
  private dispatchSeq = 0;

  constructor(
    private readonly backend: MultiplexerBackend,
    private readonly locks: PaneLockManager
  ) {}

  async dispatch(target: PaneAddress, payload: CommandPayload, options: DispatchOptions = {}): Promise<void> {
    const paneTarget = formatPaneAddress(target);
    const encoded = encodePayload(payload);

    if (!encoded.valid) {
      logger.warn({ target: paneTarget, mode: payload.mode, offset: encoded.offset }, 'Payload cannot be encoded');
      throw new InjectionError(encoded.error, target, 'control-byte', { offset: encoded.offset });
    }

    logger.info(
      {
        target: paneTarget,
        mode: payload.mode,
        submission: payload.submission ?? 'whole',
        textLength: payload.text.length,
        steps: encoded.steps.length,
      },
      'Dispatching command'
    );

    const lease = options.lease ?? (await this.locks.acquire(target, options.owner ?? `dispatch-${++this.dispatchSeq}`));
    try {
      for (const step of encoded.steps) {
        await this.injectStep(target, step);
      }
    } finally {
      if (!options.lease) {
        lease.release();
      }
    }

    logger.debug({ target: paneTarget }, 'Command dispatched');
  }

  /**
   * Send C-c to the pane's foreground process. Separate from waiting:
   * abandoning a wait never interrupts the target.
   */
  async interrupt(target: PaneAddress): Promise<void> {
    logger.info({ target: formatPaneAddress(target) }, 'Interrupting pane');
    await this.injectStep(target, { kind: 'keys', keys: ['C-c'] }, 'interrupt');
  }

  private async injectStep(
    target: PaneAddress,
    step: InjectionStep,
    operation: 'dispatch' | 'interrupt' = 'dispatch'
  ): Promise<void> {
    try {
      await this.backend.inject(target, step);
    } catch (error) {
      if (isMissingTargetError(error)) {
        logger.warn({ target: formatPaneAddress(target), operation }, 'Injection target is gone');
        throw new InjectionError(
          `Pane ${formatPaneAddress(target)} does not exist`,
          target,
          'target-missing',
          { step: step.kind },
          operation
        );
      }

      logger.error({ target: formatPaneAddress(target), operation, error }, 'Injection failed');
      throw new InjectionError(
        `Failed to inject into ${formatPaneAddress(target)}`,
        target,
        'backend-failure',
        { step: step.kind, originalError: error },
        operation
      );
    }
  }
}
