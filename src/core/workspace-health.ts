/**
 * Workspace health: the bound session exists and every registered pane is
 * still there, titled after its role, with enough scrollback
 */

import type { MultiplexerBackend } from '../types/backend.types.js';
import type { AgentRole, PaneDescription, SessionId } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import type { SessionTopology } from './session-topology.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('workspace-health');

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export type CheckOutcome = 'pass' | 'warn' | 'fail';

export interface HealthCheck {
  name: 'session' | 'pane' | 'scrollback' | 'title';
  outcome: CheckOutcome;
  detail: string;
  role?: AgentRole | undefined;
}

export interface HealthReport {
  status: HealthStatus;
  session: SessionId | undefined;
  checks: HealthCheck[];
  errors: number;
  warnings: number;
}

export interface HealthCheckOptions {
  /** Minimum scrollback per pane */
  historyLimit: number;
}

/**
 * Any failure makes the workspace unhealthy; warnings alone degrade it
 */
export function summarizeHealth(checks: readonly HealthCheck[]): HealthStatus {
  if (checks.some((check) => check.outcome === 'fail')) {
    return 'unhealthy';
  }
  return checks.some((check) => check.outcome === 'warn') ? 'degraded' : 'healthy';
}

function report(session: SessionId | undefined, checks: HealthCheck[]): HealthReport {
  const status = summarizeHealth(checks);
  const errors = checks.filter((check) => check.outcome === 'fail').length;
  const warnings = checks.filter((check) => check.outcome === 'warn').length;

  logger.info({ session, status, errors, warnings }, 'Workspace health checked');
  return { status, session, checks, errors, warnings };
}

export async function checkWorkspaceHealth(
  backend: MultiplexerBackend,
  topology: SessionTopology,
  options: HealthCheckOptions
): Promise<HealthReport> {
  const session = topology.getSession();
  const checks: HealthCheck[] = [];

  if (session === undefined) {
    checks.push({ name: 'session', outcome: 'fail', detail: 'No session bound' });
    return report(session, checks);
  }

  let exists: boolean;
  try {
    exists = await backend.sessionExists(session);
  } catch (error) {
    logger.error({ session, error }, 'Failed to query session');
    exists = false;
  }

  if (!exists) {
    checks.push({ name: 'session', outcome: 'fail', detail: `Session "${session}" does not exist` });
    return report(session, checks);
  }
  checks.push({ name: 'session', outcome: 'pass', detail: `Session "${session}" exists` });

  for (const { role, address } of topology.list()) {
    const paneTarget = formatPaneAddress(address);

    let description: PaneDescription | null;
    try {
      description = await backend.describePane(address);
    } catch (error) {
      logger.error({ role, target: paneTarget, error }, 'Failed to inspect pane');
      description = null;
    }

    if (!description) {
      checks.push({ name: 'pane', outcome: 'fail', role, detail: `Pane ${paneTarget} is gone` });
      continue;
    }
    checks.push({ name: 'pane', outcome: 'pass', role, detail: `Pane ${paneTarget} present` });

    checks.push(
      description.historyLimit >= options.historyLimit
        ? { name: 'scrollback', outcome: 'pass', role, detail: `${description.historyLimit} lines` }
        : {
            name: 'scrollback',
            outcome: 'warn',
            role,
            detail: `${description.historyLimit} lines (recommend ${options.historyLimit})`,
          }
    );

    checks.push(
      description.title === role
        ? { name: 'title', outcome: 'pass', role, detail: `Titled "${role}"` }
        : { name: 'title', outcome: 'warn', role, detail: `Titled "${description.title}"` }
    );
  }

  return report(session, checks);
}
