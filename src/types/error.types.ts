/**
 * Error taxonomy for pane orchestration
 */

import type { AgentRole, OutputSnapshot, PaneAddress } from './pane.types.js';
import { formatPaneAddress } from './pane.types.js';

export type OrchestrationOperation =
  | 'parse-address'
  | 'resolve'
  | 'current-session'
  | 'register'
  | 'dispatch'
  | 'interrupt'
  | 'capture'
  | 'provision'
  | 'arm-signal'
  | 'wait-signal'
  | 'poll-idle'
  | 'run-task'
  | 'health-check';

function describeTarget(target: PaneAddress | string | undefined): string | undefined {
  if (target === undefined || typeof target === 'string') {
    return target;
  }
  return formatPaneAddress(target);
}

export class OrchestrationError extends Error {
  public readonly target: string | undefined;
  public readonly context: Record<string, unknown> | undefined;

  constructor(
    message: string,
    public readonly operation: OrchestrationOperation,
    target?: PaneAddress | string | undefined,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OrchestrationError';
    this.target = describeTarget(target);
    this.context = context;
  }

  /** Recoverable errors leave the task in a state the caller can inspect and retry */
  get recoverable(): boolean {
    return false;
  }
}

export class InvalidPaneAddressError extends OrchestrationError {
  constructor(public readonly input: string, reason: string) {
    super(`Invalid pane address "${input}": ${reason}`, 'parse-address', input, { reason });
    this.name = 'InvalidPaneAddressError';
  }
}

export class UnknownRoleError extends OrchestrationError {
  constructor(public readonly role: AgentRole) {
    super(`No pane registered for role "${role}"`, 'resolve', undefined, { role });
    this.name = 'UnknownRoleError';
  }
}

export class NoAmbientSessionError extends OrchestrationError {
  constructor(context?: Record<string, unknown>) {
    super('Not running inside a tmux session', 'current-session', undefined, context);
    this.name = 'NoAmbientSessionError';
  }
}

export type InjectionFailureReason = 'target-missing' | 'control-byte' | 'incomplete-command' | 'backend-failure';

export class InjectionError extends OrchestrationError {
  constructor(
    message: string,
    target: PaneAddress,
    public readonly reason: InjectionFailureReason,
    context?: Record<string, unknown>,
    operation: OrchestrationOperation = 'dispatch'
  ) {
    super(message, operation, target, { ...context, reason });
    this.name = 'InjectionError';
  }
}

export class TargetUnavailableError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    operation: OrchestrationOperation,
    context?: Record<string, unknown>
  ) {
    super(`Pane ${formatPaneAddress(target)} no longer exists`, operation, target, context);
    this.name = 'TargetUnavailableError';
  }
}

export class SignalTimeoutError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    public readonly signalName: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Signal "${signalName}" not received within ${timeoutMs}ms`,
      'wait-signal',
      target,
      { signalName, timeoutMs }
    );
    this.name = 'SignalTimeoutError';
  }

  override get recoverable(): boolean {
    return true;
  }
}

export class PollExhaustedError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    public readonly samples: number,
    public readonly elapsedMs: number,
    public readonly lastSnapshot: OutputSnapshot | undefined
  ) {
    super(
      `Pane still busy after ${samples} samples (${elapsedMs}ms)`,
      'poll-idle',
      target,
      { samples, elapsedMs }
    );
    this.name = 'PollExhaustedError';
  }

  override get recoverable(): boolean {
    return true;
  }
}

export class ConcurrentDispatchViolationError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    public readonly heldBy: string,
    public readonly attemptedBy: string
  ) {
    super(
      `Pane ${formatPaneAddress(target)} is busy with "${heldBy}"`,
      'dispatch',
      target,
      { heldBy, attemptedBy }
    );
    this.name = 'ConcurrentDispatchViolationError';
  }
}

export class SessionScopeError extends OrchestrationError {
  constructor(message: string, target: PaneAddress | string, context?: Record<string, unknown>) {
    super(message, 'register', target, context);
    this.name = 'SessionScopeError';
  }
}

export class SignalReuseError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    public readonly signalName: string,
    operation: OrchestrationOperation
  ) {
    super(`Signal "${signalName}" is not available for ${operation}`, operation, target, { signalName });
    this.name = 'SignalReuseError';
  }
}

export class WaitCancelledError extends OrchestrationError {
  constructor(target: PaneAddress, operation: OrchestrationOperation, context?: Record<string, unknown>) {
    super(`Wait on ${formatPaneAddress(target)} was cancelled`, operation, target, context);
    this.name = 'WaitCancelledError';
  }
}

export class InsufficientScrollbackError extends OrchestrationError {
  constructor(
    target: PaneAddress,
    public readonly historyLimit: number,
    public readonly required: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Pane ${formatPaneAddress(target)} keeps ${historyLimit} lines of scrollback, ${required} required`,
      'register',
      target,
      { ...context, historyLimit, required }
    );
    this.name = 'InsufficientScrollbackError';
  }
}
