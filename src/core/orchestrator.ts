/**
 * Main orchestration engine
 * Dispatches tasks to role panes and waits for them to finish
 */

import type { MultiplexerBackend } from '../types/backend.types.js';
import type {
  AgentRole,
  CaptureWindow,
  CompletionSignal,
  InjectionMode,
  OutputSnapshot,
  PaneAddress,
  PaneDescription,
  SessionId,
  SyncStrategy,
} from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import {
  InsufficientScrollbackError,
  OrchestrationError,
  SessionScopeError,
  TargetUnavailableError,
} from '../types/error.types.js';
import { CommandInjector } from './command-injector.js';
import { CompletionSynchronizer } from './completion-synchronizer.js';
import { CaptureWindows, OutputObserver } from './output-observer.js';
import { PaneLockManager } from './pane-lock.js';
import { SessionTopology } from './session-topology.js';
import { SignalRegistry } from './signal-registry.js';
import { parsePaneAddress, samePaneAddress, TargetResolver } from './target-resolver.js';
import { checkWorkspaceHealth } from './workspace-health.js';
import type { HealthReport } from './workspace-health.js';
import { loadConfig } from '@utils/config';
import type { Config, ConfigInput } from '@utils/config';
import { createModuleLogger, createRoleLogger, setLogLevel } from '@utils/logger';
import { systemScheduler } from '@utils/scheduler';
import type { Scheduler } from '@utils/scheduler';
import { TmuxBackend } from '@utils/tmux-utils';

const logger = createModuleLogger('orchestrator');

/** Foreground processes that mean the pane hosts another multiplexer */
const NESTED_MULTIPLEXERS = new Set(['tmux', 'screen']);

/**
 * Everything one orchestration run shares. Passed explicitly; nothing is
 * held in module state.
 */
export interface OrchestrationContext {
  readonly config: Config;
  readonly backend: MultiplexerBackend;
  readonly scheduler: Scheduler;
  readonly topology: SessionTopology;
  readonly locks: PaneLockManager;
  readonly signals: SignalRegistry;
}

export interface OrchestrationContextOptions {
  config?: ConfigInput;
  backend?: MultiplexerBackend;
  scheduler?: Scheduler;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a context from configuration. Logging is process-wide: a log level
 * given here (config.logLevel, or LOG_LEVEL in an explicit env) applies to
 * every context in the process, so it is left alone when neither is given.
 */
export function createOrchestrationContext(options: OrchestrationContextOptions = {}): OrchestrationContext {
  const config = loadConfig(options.config, options.env);
  if (options.config?.logLevel !== undefined || options.env?.['LOG_LEVEL'] !== undefined) {
    setLogLevel(config.logLevel);
  }

  return {
    config,
    backend: options.backend ?? new TmuxBackend({
      binary: config.tmuxBinary,
      ...(options.env ? { env: options.env } : {}),
    }),
    scheduler: options.scheduler ?? systemScheduler,
    topology: new SessionTopology(),
    locks: new PaneLockManager(config.concurrentDispatch),
    signals: new SignalRegistry(config.signalPrefix),
  };
}

export interface RunTaskOptions {
  /** Output returned once the task completes (default: recent captureLines) */
  window?: CaptureWindow | undefined;
  /** Injection mode for the command (default: literal) */
  mode?: InjectionMode | undefined;
  /** Explicit signal name; generated when omitted */
  signalName?: string | undefined;
  abortSignal?: AbortSignal | undefined;
}

export interface TaskResult {
  role: AgentRole;
  target: PaneAddress;
  snapshot: OutputSnapshot;
  elapsedMs: number;
  signal?: CompletionSignal | undefined;
  samples?: number | undefined;
}

/**
 * Coordinates role panes inside one tmux session
 */
export class PaneOrchestrator {
  readonly resolver: TargetResolver;
  readonly injector: CommandInjector;
  readonly observer: OutputObserver;
  readonly synchronizer: CompletionSynchronizer;
  private taskSeq = 0;

  constructor(private readonly context: OrchestrationContext = createOrchestrationContext()) {
    const { backend, config, topology, locks, signals, scheduler } = context;

    this.resolver = new TargetResolver(topology, backend);
    this.injector = new CommandInjector(backend, locks);
    this.observer = new OutputObserver(backend, { stripAnsi: config.stripAnsi });
    this.synchronizer = new CompletionSynchronizer(backend, this.observer, signals, scheduler, {
      pollIntervalMs: config.pollIntervalMs,
      quietSamplesRequired: config.quietSamplesRequired,
      maxPollSamples: config.maxPollSamples,
      captureLines: config.captureLines,
    });

    logger.debug({ config }, 'Orchestrator initialized');
  }

  get topology(): SessionTopology {
    return this.context.topology;
  }

  /**
   * Bind to a session (the ambient one by default) and provision its scrollback
   */
  async setup(session?: SessionId): Promise<SessionId> {
    const target = session ?? (await this.resolver.currentSession());
    this.context.topology.pinSession(target);
    await this.observer.provisionScrollback(target, this.context.config.historyLimit);

    logger.info({ session: target, historyLimit: this.context.config.historyLimit }, 'Session ready');
    return target;
  }

  /**
   * Assign a role to an existing pane. The pane is registered under its
   * canonical address (window index), so one pane reached by window name and
   * by index shares a single lock.
   */
  async registerRole(role: AgentRole, address: PaneAddress | string): Promise<PaneAddress> {
    const target = typeof address === 'string' ? parsePaneAddress(address) : address;

    let description: PaneDescription | null;
    try {
      description = await this.context.backend.describePane(target);
    } catch (error) {
      logger.error({ role, target: formatPaneAddress(target), error }, 'Failed to inspect pane');
      throw new OrchestrationError(`Failed to inspect pane ${formatPaneAddress(target)}`, 'register', target, {
        role,
        originalError: error,
      });
    }

    if (!description) {
      throw new TargetUnavailableError(target, 'register', { role });
    }

    if (NESTED_MULTIPLEXERS.has(description.currentCommand)) {
      throw new SessionScopeError(
        `Pane ${formatPaneAddress(target)} runs a nested ${description.currentCommand}`,
        target,
        { role, currentCommand: description.currentCommand }
      );
    }

    const canonical = description.address;
    const { config, topology, backend } = this.context;
    topology.checkScope(role, canonical);

    if (description.historyLimit < config.historyLimit) {
      if (config.enforceHistoryLimit) {
        throw new InsufficientScrollbackError(canonical, description.historyLimit, config.historyLimit, { role });
      }
      // history-limit only applies to panes created after it is set
      logger.warn(
        { role, target: formatPaneAddress(canonical), historyLimit: description.historyLimit, required: config.historyLimit },
        'Pane scrollback is below the configured limit; full captures may be truncated'
      );
    }

    if (config.titlePanes && description.title !== role) {
      try {
        await backend.setPaneTitle(canonical, role);
      } catch (error) {
        logger.error({ role, target: formatPaneAddress(canonical), error }, 'Failed to title pane');
        throw new OrchestrationError(`Failed to title pane ${formatPaneAddress(canonical)}`, 'register', canonical, {
          role,
          originalError: error,
        });
      }
    }

    const sharing = topology.list().filter((entry) => entry.role !== role && samePaneAddress(entry.address, canonical));
    if (sharing.length > 0) {
      logger.info(
        { role, target: formatPaneAddress(canonical), sharedWith: sharing.map((entry) => entry.role) },
        'Roles share a pane; their tasks run one at a time'
      );
    }

    topology.register(role, canonical);
    return canonical;
  }

  /**
   * Check the bound session and every registered pane
   */
  async healthCheck(): Promise<HealthReport> {
    return checkWorkspaceHealth(this.context.backend, this.context.topology, {
      historyLimit: this.context.config.historyLimit,
    });
  }

  /**
   * Dispatch a command to a role's pane, wait for it to finish and capture
   * its output
   */
  async runTask(
    role: AgentRole,
    commandText: string,
    strategy: SyncStrategy,
    options: RunTaskOptions = {}
  ): Promise<OutputSnapshot> {
    const result = await this.runTaskDetailed(role, commandText, strategy, options);
    return result.snapshot;
  }

  /**
   * runTask with timing and synchronization details. The pane stays locked
   * from dispatch until the output is captured.
   */
  async runTaskDetailed(
    role: AgentRole,
    commandText: string,
    strategy: SyncStrategy,
    options: RunTaskOptions = {}
  ): Promise<TaskResult> {
    const target = this.resolver.resolve(role);
    const roleLogger = createRoleLogger(role);
    const owner = `${role}-task-${++this.taskSeq}`;
    const startedAt = this.context.scheduler.now();
    const mode = options.mode ?? 'literal';

    roleLogger.info({ target: formatPaneAddress(target), strategy: strategy.kind, owner }, 'Starting task');

    const lease = await this.context.locks.acquire(target, owner);
    try {
      let signal: CompletionSignal | undefined;
      let samples: number | undefined;

      if (strategy.kind === 'signal') {
        // Armed before dispatch so a fast command cannot signal ahead of the waiter
        signal = this.synchronizer.arm(target, { name: options.signalName });
        try {
          await this.injector.dispatch(
            target,
            { text: this.synchronizer.withSignal(commandText, signal), mode },
            { lease }
          );
        } catch (error) {
          this.context.signals.abandon(signal);
          throw error;
        }

        await this.synchronizer.waitForSignal(signal, {
          timeoutMs: strategy.timeoutMs ?? this.context.config.signalTimeoutMs ?? undefined,
          abortSignal: options.abortSignal,
        });
      } else {
        await this.injector.dispatch(target, { text: commandText, mode }, { lease });
        const result = await this.synchronizer.pollUntilIdle(target, {
          isBusy: strategy.isBusy,
          intervalMs: strategy.intervalMs,
          maxSamples: strategy.maxSamples,
          maxWaitMs: strategy.maxWaitMs,
          abortSignal: options.abortSignal,
        });
        samples = result.samples;
      }

      const snapshot = await this.observer.capture(
        target,
        options.window ?? CaptureWindows.recent(this.context.config.captureLines)
      );
      const elapsedMs = this.context.scheduler.now() - startedAt;

      roleLogger.info({ target: formatPaneAddress(target), elapsedMs }, 'Task completed');
      return { role, target, snapshot, elapsedMs, signal, samples };
    } catch (error) {
      roleLogger.error({ target: formatPaneAddress(target), error }, 'Task failed');
      throw error;
    } finally {
      lease.release();
    }
  }

  async capture(role: AgentRole, window?: CaptureWindow): Promise<OutputSnapshot> {
    return this.observer.capture(
      this.resolver.resolve(role),
      window ?? CaptureWindows.recent(this.context.config.captureLines)
    );
  }

  async interrupt(role: AgentRole): Promise<void> {
    await this.injector.interrupt(this.resolver.resolve(role));
  }

  /**
   * Forget every role and release the session binding. Panes are left running.
   */
  teardown(): void {
    const outstanding = this.context.signals.outstanding();
    for (const signal of outstanding) {
      this.context.signals.abandon(signal);
    }
    this.context.topology.unregisterAll();
    logger.info({ abandonedSignals: outstanding.length }, 'Orchestrator torn down');
  }
}
