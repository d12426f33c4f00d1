/**
 * Service Logger
 *
 * Structured JSON logging via pino. Every service gets a child logger tagged
 * with its name; the `log` helpers keep method entry/exit/error records uniform.
 *
 * Level comes from LOG_LEVEL (default: info).
 */

import pino from 'pino';

export type ServiceLogger = pino.Logger;

export const logger = pino({
  name: 'nft-amm',
  level: process.env.LOG_LEVEL ?? 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger for a service
 */
export function createServiceLogger(service: string): ServiceLogger {
  return logger.child({ service });
}

/**
 * Logging helpers for consistent method entry/exit logging
 */
export const log = {
  methodEntry: (
    log: ServiceLogger,
    method: string,
    params?: Record<string, unknown>
  ) => {
    log.debug({ method, ...params }, `→ ${method}`);
  },

  methodExit: (
    log: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    log.debug({ method, ...result }, `← ${method}`);
  },

  methodError: (
    log: ServiceLogger,
    method: string,
    error: unknown,
    context?: Record<string, unknown>
  ) => {
    log.error(
      {
        method,
        error: error instanceof Error ? error.message : String(error),
        errorName: error instanceof Error ? error.name : undefined,
        ...context,
      },
      `✗ ${method}`
    );
  },

  stateChange: (
    log: ServiceLogger,
    entity: string,
    change: Record<string, unknown>
  ) => {
    log.info({ entity, ...change }, `${entity} updated`);
  },

  rollback: (log: ServiceLogger, operation: string, undoCount: number) => {
    log.warn({ operation, undoCount }, `Rolled back ${operation}`);
  },
};
