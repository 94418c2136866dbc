/**
 * Pane address parsing and role resolution
 */

import { z } from 'zod';
import type { MultiplexerBackend } from '../types/backend.types.js';
import type { AgentRole, PaneAddress, SessionId } from '../types/pane.types.js';
import { toSessionId } from '../types/pane.types.js';
import {
  InvalidPaneAddressError,
  NoAmbientSessionError,
  UnknownRoleError,
} from '../types/error.types.js';
import type { SessionTopology } from './session-topology.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('target-resolver');

export const PaneAddressSchema = z.object({
  session: z
    .string()
    .min(1, 'session must not be empty')
    .regex(/^[^:.]+$/, 'session must not contain ":" or "."'),
  window: z.union([
    z.number().int().min(0),
    z.string().min(1).regex(/^[^:.]+$/, 'window must not contain ":" or "."'),
  ]),
  pane: z.number().int().min(0),
});

/**
 * Validate a structured address, returning a normalized copy
 */
export function toPaneAddress(input: { session: string; window: string | number; pane: number }): PaneAddress {
  const result = PaneAddressSchema.safeParse(input);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidPaneAddressError(`${input.session}:${input.window}.${input.pane}`, reason);
  }

  const { session, window, pane } = result.data;
  return {
    session: toSessionId(session),
    window: typeof window === 'string' && /^\d+$/.test(window) ? parseInt(window, 10) : window,
    pane,
  };
}

/**
 * Parse `session:window.pane`. Numeric windows become indexes.
 */
export function parsePaneAddress(text: string): PaneAddress {
  const match = /^([^:]*):([^.]*)\.(\d+)$/.exec(text.trim());
  if (!match) {
    throw new InvalidPaneAddressError(text, 'expected session:window.pane');
  }

  const [, session = '', window = '', pane = ''] = match;
  return toPaneAddress({ session, window, pane: parseInt(pane, 10) });
}

export function samePaneAddress(a: PaneAddress, b: PaneAddress): boolean {
  return a.session === b.session && String(a.window) === String(b.window) && a.pane === b.pane;
}

/**
 * Looks up targets without ever creating topology entries
 */
export class TargetResolver {
  constructor(
    private readonly topology: SessionTopology,
    private readonly backend: MultiplexerBackend
  ) {}

  resolve(role: AgentRole): PaneAddress {
    const address = this.topology.lookup(role);
    if (!address) {
      logger.warn({ role, knownRoles: this.topology.roles() }, 'Role not registered');
      throw new UnknownRoleError(role);
    }
    return address;
  }

  /**
   * Name of the tmux session this process runs in
   */
  async currentSession(): Promise<SessionId> {
    let session: SessionId | null;
    try {
      session = await this.backend.currentSession();
    } catch (error) {
      logger.error({ error }, 'Failed to query ambient session');
      throw new NoAmbientSessionError({ originalError: error });
    }

    if (!session) {
      throw new NoAmbientSessionError();
    }
    return session;
  }
}
