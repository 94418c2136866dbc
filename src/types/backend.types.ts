/**
 * Boundary to the terminal multiplexer
 */

import type {
  InjectionStep,
  PaneAddress,
  PaneDescription,
  SessionId,
  SignalName,
} from './pane.types.js';

export interface CaptureRequest {
  /** Scrollback lines above the visible screen to include, or the whole history */
  history: number | 'all';
}

export interface WaitSignalOptions {
  abortSignal?: AbortSignal | undefined;
}

/**
 * Primitive operations the orchestration core needs from a multiplexer.
 *
 * Operations against a pane that does not exist reject with a TmuxError
 * whose stderr names the missing target (see isMissingTargetError).
 */
export interface MultiplexerBackend {
  inject(target: PaneAddress, step: InjectionStep): Promise<void>;
  /** Raw lines, escape sequences preserved, wrapped lines joined */
  capture(target: PaneAddress, request: CaptureRequest): Promise<string[]>;
  emitSignal(name: SignalName): Promise<void>;
  /** Resolves once the named signal fires; rejects with the abort reason when cancelled */
  waitSignal(name: SignalName, options?: WaitSignalOptions): Promise<void>;
  /** Shell command that emits the signal when run inside a pane */
  signalCommand(name: SignalName): string;
  /** Null when the pane does not exist */
  describePane(target: PaneAddress): Promise<PaneDescription | null>;
  setPaneTitle(target: PaneAddress, title: string): Promise<void>;
  sessionExists(session: SessionId): Promise<boolean>;
  /** Null when not running inside a session */
  currentSession(): Promise<SessionId | null>;
  setHistoryLimit(session: SessionId, lines: number): Promise<void>;
}
