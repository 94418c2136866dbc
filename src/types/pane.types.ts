/**
 * Pane addressing, payload and snapshot types
 */

// Branded types for compile-time safety
export type SessionId = string & { readonly __brand: 'SessionId' };
export type SignalName = string & { readonly __brand: 'SignalName' };

// Helper functions to create branded types
export function toSessionId(name: string): SessionId {
  return name as SessionId;
}

export function toSignalName(name: string): SignalName {
  return name as SignalName;
}

/**
 * Logical agent roles. Any other string is accepted so callers can add
 * their own roles without touching this module.
 */
export type AgentRole = 'orchestrator' | 'worker' | 'reviewer' | (string & {});

/**
 * Structural pane address: `session:window.pane`
 */
export interface PaneAddress {
  readonly session: SessionId;
  readonly window: string | number;  // window name or index
  readonly pane: number;             // pane index within the window
}

/**
 * Render an address in tmux target syntax
 */
export function formatPaneAddress(address: PaneAddress): string {
  return `${address.session}:${address.window}.${address.pane}`;
}

export type InjectionMode = 'interpreted' | 'literal';

export type SubmissionStyle = 'whole' | 'line-at-a-time';

export interface CommandPayload {
  text: string;
  mode: InjectionMode;
  submission?: SubmissionStyle | undefined;  // default: 'whole'
}

/**
 * One primitive injection call against a pane.
 *
 * - `keys`: arguments tmux may read as key names (`Enter`, `C-c`, ...)
 * - `literal`: characters delivered as data only
 * - `submit`: a single explicit Enter
 */
export type InjectionStep =
  | { readonly kind: 'keys'; readonly keys: readonly string[] }
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'submit' };

export type CaptureWindow =
  | { readonly kind: 'recent'; readonly lines: number }
  | { readonly kind: 'all' }
  | { readonly kind: 'since-offset'; readonly offset: number };

export interface OutputSnapshot {
  readonly target: PaneAddress;
  readonly lines: readonly string[];
  readonly capturedAt: Date;
  readonly ansiStripped: boolean;
  /** Absolute history index of the first line; null for `recent` windows */
  readonly startOffset: number | null;
}

export interface CompletionSignal {
  readonly name: SignalName;
  readonly target: PaneAddress;
  readonly createdAt: Date;
}

export type SyncStrategy =
  | {
      readonly kind: 'signal';
      readonly timeoutMs?: number | undefined;
    }
  | {
      readonly kind: 'idle-poll';
      readonly isBusy: (snapshot: OutputSnapshot) => boolean;
      readonly intervalMs?: number | undefined;
      readonly maxSamples?: number | undefined;
      readonly maxWaitMs?: number | undefined;
    };

export interface PaneDescription {
  /** Canonical address: window index rather than window name */
  address: PaneAddress;
  currentCommand: string;  // foreground process name
  historyLimit: number;
  title: string;
}
