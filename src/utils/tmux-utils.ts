/**
 * Tmux control helpers
 */

import { execa } from 'execa';
import type {
  CaptureRequest,
  MultiplexerBackend,
  WaitSignalOptions,
} from '../types/backend.types.js';
import type {
  InjectionStep,
  PaneAddress,
  PaneDescription,
  SessionId,
  SignalName,
} from '../types/pane.types.js';
import { formatPaneAddress, toSessionId } from '../types/pane.types.js';
import { toPaneAddress } from '../core/target-resolver.js';
import { createModuleLogger } from '@utils/logger';
import { abortReason } from '@utils/scheduler';
import { escapeShellArg, escapeTmuxArgument } from '@utils/sanitize';

const logger = createModuleLogger('tmux-utils');

/** Minimum supported tmux version */
export const MIN_TMUX_VERSION = '3.0';

/**
 * Branded type for tmux pane IDs
 */
export type PaneId = string & { readonly __brand: 'PaneId' };

/**
 * Check if currently running inside tmux
 */
export function isInsideTmux(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!env['TMUX'];
}

/**
 * Get current tmux pane ID (when running inside tmux)
 */
export function getCurrentPane(env: NodeJS.ProcessEnv = process.env): PaneId | null {
  const paneId = env['TMUX_PANE'];
  return paneId ? (paneId as PaneId) : null;
}

export class TmuxError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message);
    this.name = 'TmuxError';
  }
}

/**
 * True when tmux failed because the addressed session, window or pane is gone
 */
export function isMissingTargetError(error: unknown): boolean {
  if (!(error instanceof TmuxError) || !error.stderr) {
    return false;
  }
  return /can't find (pane|window|session)|no such (pane|window|session)/i.test(error.stderr);
}

/** Canonical address, foreground command, scrollback size and title of a pane */
const PANE_FORMAT =
  '#{session_name}\t#{window_index}\t#{pane_index}\t#{pane_current_command}\t#{history_limit}\t#{pane_title}';

export interface TmuxRunOptions {
  input?: string | undefined;
  abortSignal?: AbortSignal | undefined;
}

export interface TmuxRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  isCanceled: boolean;
}

/**
 * Runs the tmux binary. Swappable so the backend can be exercised without a server.
 */
export type TmuxRunner = (
  file: string,
  args: readonly string[],
  options: TmuxRunOptions
) => Promise<TmuxRunResult>;

export const execaRunner: TmuxRunner = async (file, args, options) => {
  const result = await execa(file, [...args], {
    reject: false,
    ...(options.input !== undefined ? { input: options.input } : {}),
    ...(options.abortSignal ? { signal: options.abortSignal } : {}),
  });

  return {
    exitCode: result.exitCode ?? 1,
    stdout: result.stdout,
    stderr: result.stderr,
    isCanceled: result.isCanceled,
  };
};

export interface TmuxBackendOptions {
  binary?: string;
  runner?: TmuxRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * MultiplexerBackend over the tmux command line
 */
export class TmuxBackend implements MultiplexerBackend {
  private readonly binary: string;
  private readonly runner: TmuxRunner;
  private readonly env: NodeJS.ProcessEnv;
  private bufferSeq = 0;

  constructor(options: TmuxBackendOptions = {}) {
    this.binary = options.binary ?? 'tmux';
    this.runner = options.runner ?? execaRunner;
    this.env = options.env ?? process.env;
  }

  /**
   * Execute a tmux command. Every argument is escaped for the tmux parser.
   */
  async execTmux(args: string[], options: TmuxRunOptions = {}): Promise<string> {
    const result = await this.runner(this.binary, args.map(escapeTmuxArgument), options);

    if (result.isCanceled && options.abortSignal) {
      throw abortReason(options.abortSignal);
    }

    if (result.exitCode !== 0) {
      throw new TmuxError(
        `Tmux command failed: ${args.join(' ')}`,
        args.join(' '),
        result.exitCode,
        result.stderr
      );
    }

    return result.stdout;
  }

  async inject(target: PaneAddress, step: InjectionStep): Promise<void> {
    const paneTarget = formatPaneAddress(target);
    logger.debug({ target: paneTarget, step }, 'Injecting into pane');

    switch (step.kind) {
      case 'keys':
        await this.execTmux(['send-keys', '-t', paneTarget, '--', ...step.keys]);
        return;

      case 'submit':
        await this.execTmux(['send-keys', '-t', paneTarget, 'Enter']);
        return;

      case 'literal':
        if (!step.text.includes('\n')) {
          await this.execTmux(['send-keys', '-t', paneTarget, '-l', '--', step.text]);
          return;
        }
        await this.pasteText(paneTarget, step.text);
        return;
    }
  }

  /**
   * Multi-line data goes through a paste buffer so line feeds stay data.
   * -p wraps it in bracketed paste when the application asked for it.
   */
  private async pasteText(paneTarget: string, text: string): Promise<void> {
    const bufferName = `pane-orch-${process.pid}-${++this.bufferSeq}`;

    await this.execTmux(['load-buffer', '-b', bufferName, '-'], { input: text });
    try {
      await this.execTmux(['paste-buffer', '-d', '-p', '-r', '-b', bufferName, '-t', paneTarget]);
    } catch (error) {
      // -d only deletes the buffer after a successful paste
      await this.execTmux(['delete-buffer', '-b', bufferName]).catch((cleanupError: unknown) => {
        logger.warn({ buffer: bufferName, error: cleanupError }, 'Failed to delete paste buffer');
      });
      throw error;
    }
  }

  async capture(target: PaneAddress, request: CaptureRequest): Promise<string[]> {
    const start = request.history === 'all' ? '-' : `-${request.history}`;

    const output = await this.execTmux([
      'capture-pane',
      '-t', formatPaneAddress(target),
      '-p', // print to stdout
      '-e', // keep escape sequences, stripping is done by the caller
      '-J', // join wrapped lines
      '-S', start,
    ]);

    return output.length === 0 ? [] : output.split('\n');
  }

  async emitSignal(name: SignalName): Promise<void> {
    await this.execTmux(['wait-for', '-S', name]);
  }

  async waitSignal(name: SignalName, options: WaitSignalOptions = {}): Promise<void> {
    await this.execTmux(['wait-for', name], { abortSignal: options.abortSignal });
  }

  signalCommand(name: SignalName): string {
    return `${escapeShellArg(this.binary)} wait-for -S ${escapeShellArg(name)}`;
  }

  async describePane(target: PaneAddress): Promise<PaneDescription | null> {
    try {
      const output = await this.execTmux([
        'display-message',
        '-p',
        '-t', formatPaneAddress(target),
        PANE_FORMAT,
      ]);

      const [session = '', windowIndex = '', paneIndex = '', currentCommand = '', historyLimit = '0', title = ''] =
        output.replace(/\n$/, '').split('\t');
      return {
        address: toPaneAddress({
          session,
          window: parseInt(windowIndex, 10),
          pane: parseInt(paneIndex, 10),
        }),
        currentCommand,
        historyLimit: parseInt(historyLimit, 10),
        title,
      };
    } catch (error) {
      if (isMissingTargetError(error)) {
        logger.debug({ target: formatPaneAddress(target) }, 'Pane does not exist');
        return null;
      }
      throw error;
    }
  }

  async setPaneTitle(target: PaneAddress, title: string): Promise<void> {
    await this.execTmux(['select-pane', '-t', formatPaneAddress(target), '-T', title]);
  }

  async sessionExists(session: SessionId): Promise<boolean> {
    try {
      await this.execTmux(['has-session', '-t', `=${session}`]);
      return true;
    } catch (error) {
      if (isMissingTargetError(error)) {
        return false;
      }
      throw error;
    }
  }

  async currentSession(): Promise<SessionId | null> {
    if (!isInsideTmux(this.env)) {
      return null;
    }

    const paneId = getCurrentPane(this.env);
    const args = paneId
      ? ['display-message', '-p', '-t', paneId, '#S']
      : ['display-message', '-p', '#S'];

    const name = (await this.execTmux(args)).trim();
    return name ? toSessionId(name) : null;
  }

  async setHistoryLimit(session: SessionId, lines: number): Promise<void> {
    logger.info({ session, lines }, 'Setting scrollback retention');
    await this.execTmux(['set-option', '-t', session, 'history-limit', lines.toString()]);
  }
}

export interface TmuxInfo {
  /** Version string (e.g., "3.4") */
  version: string;
  supported: boolean;
}

/**
 * Compare dotted versions, ignoring letter suffixes ("3.3a" >= "3.0")
 */
export function isVersionAtLeast(version: string, minimum: string): boolean {
  const parse = (v: string): number[] => v.split('.').map((part) => parseInt(part, 10) || 0);
  const actual = parse(version);
  const required = parse(minimum);

  for (let i = 0; i < Math.max(actual.length, required.length); i++) {
    const a = actual[i] ?? 0;
    const r = required[i] ?? 0;
    if (a !== r) {
      return a > r;
    }
  }
  return true;
}

/**
 * Report the installed tmux version
 */
export async function checkTmux(
  binary = 'tmux',
  runner: TmuxRunner = execaRunner
): Promise<TmuxInfo> {
  const result = await runner(binary, ['-V'], {});
  const match = result.stdout.trim().match(/tmux\s+(?:next-)?(\d+\.\d+\w?)/i);

  if (result.exitCode !== 0 || !match?.[1]) {
    throw new TmuxError('Unable to determine tmux version', `${binary} -V`, result.exitCode, result.stderr);
  }

  const version = match[1];
  return { version, supported: isVersionAtLeast(version, MIN_TMUX_VERSION) };
}
