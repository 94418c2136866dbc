/**
 * Structured logging with Pino
 */

import pino from 'pino';

const env = process.env['NODE_ENV'];
const isInteractive = env !== 'production' && env !== 'test' && process.stdout.isTTY === true;

const loggerOptions: pino.LoggerOptions = isInteractive
  ? {
      level: process.env['LOG_LEVEL'] || 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'HH:MM:ss',
        },
      },
    }
  : {
      level: process.env['LOG_LEVEL'] || 'info',
    };

export const logger: pino.Logger = pino(loggerOptions);

// Children snapshot their level on creation, so level changes are fanned out
const children: pino.Logger[] = [];
const roleLoggers = new Map<string, pino.Logger>();

/**
 * Get the child logger for a specific agent role
 */
export function createRoleLogger(role: string): pino.Logger {
  const existing = roleLoggers.get(role);
  if (existing) {
    return existing;
  }

  const child = logger.child({ role });
  children.push(child);
  roleLoggers.set(role, child);
  return child;
}

/**
 * Create a child logger for a specific module
 */
export function createModuleLogger(module: string): pino.Logger {
  const child = logger.child({ module });
  children.push(child);
  return child;
}

/**
 * Apply a configured level to the root logger and all of its children
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
