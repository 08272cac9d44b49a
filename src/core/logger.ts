/**
 * Structured logging with Pino
 *
 * JSON lines in production, pino-pretty in development.
 * Modules take a child logger via createModuleLogger().
 */

import { pino as createPino, type Logger } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';
const logLevel = process.env.LOG_LEVEL || 'info';

const baseOptions = {
  level: logLevel,
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: createPino.stdTimeFunctions.isoTime,
};

export const logger: Logger = isDevelopment
  ? createPino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    })
  : createPino(baseOptions);

/**
 * Create a child logger with module context
 * @param module Module name (e.g., 'staking-pool', 'token-ledger', 'http')
 */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Log a committed ledger operation
 */
export function logLedgerOperation(
  log: Logger,
  event: string,
  details: Record<string, string | number | boolean>
) {
  log.info({ ...details, event }, `Ledger operation: ${event}`);
}

/**
 * Log a rejected ledger operation
 */
export function logLedgerRejection(
  log: Logger,
  operation: string,
  code: string,
  details: Record<string, string | number | boolean>
) {
  log.warn(
    { ...details, operation, code, event: 'operation_rejected' },
    `Ledger operation rejected: ${operation} (${code})`
  );
}
