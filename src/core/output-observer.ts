/**
 * Pane output capture as immutable snapshots
 */

import type { MultiplexerBackend } from '../types/backend.types.js';
import type { CaptureWindow, OutputSnapshot, PaneAddress, SessionId } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import { OrchestrationError, TargetUnavailableError } from '../types/error.types.js';
import { createModuleLogger } from '@utils/logger';
import { stripAnsiLines } from '@utils/ansi';
import { isMissingTargetError } from '@utils/tmux-utils';

const logger = createModuleLogger('output-observer');

/**
 * Capture window constructors
 */
export const CaptureWindows = {
  recent(lines: number): CaptureWindow {
    if (!Number.isInteger(lines) || lines < 1) {
      throw new RangeError(`Recent window needs a positive line count, got ${lines}`);
    }
    return { kind: 'recent', lines };
  },

  all(): CaptureWindow {
    return { kind: 'all' };
  },

  sinceOffset(offset: number): CaptureWindow {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
    }
    return { kind: 'since-offset', offset };
  },
} as const;

export interface CaptureOptions {
  stripAnsi?: boolean | undefined;
}

/**
 * Drop the blank rows tmux pads below the last line of output
 */
function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && (lines[end - 1] ?? '').trim() === '') {
    end--;
  }
  return lines.slice(0, end);
}

function selectWindow(
  buffer: string[],
  window: CaptureWindow
): { lines: string[]; startOffset: number | null } {
  switch (window.kind) {
    case 'recent':
      return { lines: buffer.slice(-window.lines), startOffset: null };
    case 'all':
      return { lines: buffer, startOffset: 0 };
    case 'since-offset':
      return {
        lines: buffer.slice(window.offset),
        startOffset: Math.min(window.offset, buffer.length),
      };
  }
}

export function lastNonEmptyLine(snapshot: OutputSnapshot): string | undefined {
  for (let i = snapshot.lines.length - 1; i >= 0; i--) {
    const line = snapshot.lines[i];
    if (line !== undefined && line.trim() !== '') {
      return line;
    }
  }
  return undefined;
}

export class OutputObserver {
  constructor(
    private readonly backend: MultiplexerBackend,
    private readonly defaults: { stripAnsi: boolean } = { stripAnsi: true }
  ) {}

  /**
   * Capture a window of the pane's visible screen plus scrollback
   */
  async capture(
    target: PaneAddress,
    window: CaptureWindow,
    options: CaptureOptions = {}
  ): Promise<OutputSnapshot> {
    const paneTarget = formatPaneAddress(target);
    const stripAnsi = options.stripAnsi ?? this.defaults.stripAnsi;
    logger.debug({ target: paneTarget, window, stripAnsi }, 'Capturing pane output');

    let raw: string[];
    try {
      raw = await this.backend.capture(target, {
        history: window.kind === 'recent' ? window.lines : 'all',
      });
    } catch (error) {
      if (isMissingTargetError(error)) {
        logger.warn({ target: paneTarget }, 'Capture target is gone');
        throw new TargetUnavailableError(target, 'capture', { window });
      }
      logger.error({ target: paneTarget, error }, 'Failed to capture pane');
      throw new OrchestrationError(`Failed to capture pane ${paneTarget}`, 'capture', target, {
        window,
        originalError: error,
      });
    }

    const { lines, startOffset } = selectWindow(trimTrailingBlank(raw), window);

    const snapshot: OutputSnapshot = Object.freeze({
      target,
      lines: Object.freeze(stripAnsi ? stripAnsiLines(lines) : lines),
      capturedAt: new Date(),
      ansiStripped: stripAnsi,
      startOffset,
    });

    logger.debug({ target: paneTarget, lines: snapshot.lines.length }, 'Pane captured');
    return snapshot;
  }

  /**
   * Raise the scrollback retention so full-history captures are not truncated.
   * tmux applies history-limit to panes created afterwards.
   */
  async provisionScrollback(session: SessionId, lines: number): Promise<void> {
    try {
      await this.backend.setHistoryLimit(session, lines);
    } catch (error) {
      logger.error({ session, lines, error }, 'Failed to provision scrollback');
      throw new OrchestrationError(`Failed to set history limit on ${session}`, 'provision', session, {
        lines,
        originalError: error,
      });
    }
  }
}
