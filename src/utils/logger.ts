/**
 * Pino Logger with Structured Fields
 *
 * Includes runId and corrId in logs. Set LOG_DESTINATION=stderr when stdout
 * carries a protocol (MCP over stdio).
 */

import pino from 'pino';

const destination = process.env.LOG_DESTINATION === 'stderr' ? 2 : 1;

const baseOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  base: {
    service: 'id-verifier',
    version: '1.0.0',
  },
};

// Create base logger
export const logger = process.env.NODE_ENV === 'development'
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination,
        },
      },
    })
  : pino(baseOptions, pino.destination(destination));

/**
 * Create child logger with context fields
 */
export function createContextLogger(context: {
  runId?: string;
  corrId?: string;
  source?: string;
}): pino.Logger {
  return logger.child(context);
}
