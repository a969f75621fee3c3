/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, destination, type LoggerOptions, type TransportTargetOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const LOG_FILE = process.env['LOG_FILE'];
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

function buildTransportTargets(): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (NODE_ENV === 'development') {
    targets.push({
      target: 'pino-pretty',
      level: LOG_LEVEL,
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  }

  // Persistent log beside the link and filter data
  if (LOG_FILE) {
    targets.push({
      target: 'pino/file',
      level: LOG_LEVEL,
      options: { destination: LOG_FILE, mkdir: true },
    });
  }

  return targets;
}

const targets = buildTransportTargets();

const options: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'linkgarden',
    env: NODE_ENV,
  },
};

// Without a transport, JSON lines go to stderr
export const logger = targets.length > 0
  ? pino({ ...options, transport: { targets } })
  : pino(
      {
        ...options,
        formatters: {
          level: (label: string) => ({ level: label }),
        },
      },
      destination(2)
    );

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
