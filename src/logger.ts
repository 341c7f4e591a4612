import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Structured JSON logger shared by the ledger and the HTTP server.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
    ...options,
  });
}
