import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

const SERVICE_NAME = 'sanctions-list-sync';

/**
 * Logs go to stderr: stdout carries the MCP stdio transport and CLI summaries.
 */
export function createLogger(level: string): Logger {
  return pino(
    {
      level,
      base: { service: SERVICE_NAME },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export const silentLogger: Logger = pino({ level: 'silent' });
