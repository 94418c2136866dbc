/**
 * Role → pane mapping for a single tmux session
 */

import type { AgentRole, PaneAddress, SessionId } from '../types/pane.types.js';
import { formatPaneAddress } from '../types/pane.types.js';
import { SessionScopeError } from '../types/error.types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('session-topology');

export interface TopologyEntry {
  role: AgentRole;
  address: PaneAddress;
  registeredAt: Date;
}

/**
 * Owns which pane plays which role. All targets live in one session;
 * panes reached through a nested multiplexer would make addresses ambiguous.
 *
 * Mutations are synchronous, so writers never interleave and readers never wait.
 */
export class SessionTopology {
  private entries: Map<AgentRole, TopologyEntry> = new Map();
  private session: SessionId | undefined;

  /**
   * Fix the session every later registration must belong to
   */
  pinSession(session: SessionId): void {
    if (this.session !== undefined && this.session !== session) {
      throw new SessionScopeError(
        `Topology already bound to session "${this.session}"`,
        session,
        { pinnedSession: this.session, requestedSession: session }
      );
    }

    this.session = session;
    logger.info({ session }, 'Topology pinned to session');
  }

  getSession(): SessionId | undefined {
    return this.session;
  }

  /**
   * Map a role to a pane, replacing any previous mapping
   */
  register(role: AgentRole, address: PaneAddress): void {
    this.checkScope(role, address);

    const previous = this.entries.get(role);
    this.session = address.session;
    this.entries.set(role, { role, address, registeredAt: new Date() });

    if (previous) {
      logger.warn(
        { role, from: formatPaneAddress(previous.address), to: formatPaneAddress(address) },
        'Role reassigned'
      );
    } else {
      logger.info({ role, target: formatPaneAddress(address) }, 'Role registered');
    }
  }

  /**
   * Throw SessionScopeError when the pane lies outside the bound session
   */
  checkScope(role: AgentRole, address: PaneAddress): void {
    if (this.session !== undefined && address.session !== this.session) {
      throw new SessionScopeError(
        `Pane ${formatPaneAddress(address)} is outside session "${this.session}"`,
        address,
        { role, pinnedSession: this.session }
      );
    }
  }

  lookup(role: AgentRole): PaneAddress | undefined {
    return this.entries.get(role)?.address;
  }

  roles(): AgentRole[] {
    return Array.from(this.entries.keys());
  }

  list(): TopologyEntry[] {
    return Array.from(this.entries.values());
  }

  /**
   * Clear every mapping and release the session binding (session teardown)
   */
  unregisterAll(): void {
    logger.info({ count: this.entries.size, session: this.session }, 'Clearing topology');
    this.entries.clear();
    this.session = undefined;
  }
}
