/**
 * Pane orchestration core
 * Drive processes running in tmux panes: dispatch commands, capture output
 * and wait for completion
 */

export * from './types/pane.types.js';
export * from './types/error.types.js';
export type { CaptureRequest, MultiplexerBackend, WaitSignalOptions } from './types/backend.types.js';

export { PaneOrchestrator, createOrchestrationContext } from './core/orchestrator.js';
export type {
  OrchestrationContext,
  OrchestrationContextOptions,
  RunTaskOptions,
  TaskResult,
} from './core/orchestrator.js';
export { TargetResolver, PaneAddressSchema, parsePaneAddress, toPaneAddress, samePaneAddress } from './core/target-resolver.js';
export { SessionTopology } from './core/session-topology.js';
export type { TopologyEntry } from './core/session-topology.js';
export { CommandInjector } from './core/command-injector.js';
export type { DispatchOptions } from './core/command-injector.js';
export { encodePayload, decodeSteps, isReservedKeyToken } from './core/command-encoder.js';
export type { EncodeResult, InputEvent } from './core/command-encoder.js';
export { OutputObserver, CaptureWindows, lastNonEmptyLine } from './core/output-observer.js';
export type { CaptureOptions } from './core/output-observer.js';
export { CompletionSynchronizer, chainCommand, isIncompleteCommand } from './core/completion-synchronizer.js';
export type {
  IdlePollOptions,
  IdlePollResult,
  SignalWaitOptions,
  SignalWaitResult,
  SynchronizerDefaults,
} from './core/completion-synchronizer.js';
export { checkWorkspaceHealth, summarizeHealth } from './core/workspace-health.js';
export type { CheckOutcome, HealthCheck, HealthCheckOptions, HealthReport, HealthStatus } from './core/workspace-health.js';
export { SignalRegistry } from './core/signal-registry.js';
export type { SignalState } from './core/signal-registry.js';
export { PaneLockManager } from './core/pane-lock.js';
export type { LockPolicy, PaneLease } from './core/pane-lock.js';
export { advanceIdleState, busyMarker, findIdleIndex, INITIAL_IDLE_STATE } from './core/idle-state.js';
export type { IdlePhase, IdleState } from './core/idle-state.js';

export { ConfigSchema, loadConfig } from './utils/config.js';
export type { Config, ConfigInput } from './utils/config.js';
export { logger, createModuleLogger, setLogLevel } from './utils/logger.js';
export { systemScheduler } from './utils/scheduler.js';
export type { Scheduler } from './utils/scheduler.js';
export { stripAnsiLine, stripAnsiLines } from './utils/ansi.js';
export {
  TmuxBackend,
  TmuxError,
  checkTmux,
  execaRunner,
  isInsideTmux,
  isMissingTargetError,
  isVersionAtLeast,
  MIN_TMUX_VERSION,
} from './utils/tmux-utils.js';
export type { TmuxBackendOptions, TmuxInfo, TmuxRunner, TmuxRunOptions, TmuxRunResult } from './utils/tmux-utils.js';
