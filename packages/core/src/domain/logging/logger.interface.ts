/**
 * @fileoverview ILogger - Logging Port
 *
 * @packageDocumentation
 * @module @graphward/core/domain/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The container reports scope lifecycle, planning and release failures
 * through this port. Adapters live in the infrastructure layer.
 */

/**
 * Log severities, lowest first.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Silent = 'silent',
}

/**
 * Structured fields attached to a log line.
 */
export type LogFields = Readonly<Record<string, unknown>>;

/**
 * ILogger - Minimal structured logger.
 *
 * @example Adapting an application logger
 * ```typescript
 * const logger: ILogger = {
 *   debug: (msg, fields) => appLog.debug(fields, msg),
 *   info: (msg, fields) => appLog.info(fields, msg),
 *   warn: (msg, fields) => appLog.warn(fields, msg),
 *   error: (msg, fields) => appLog.error(fields, msg),
 * };
 *
 * services.build({ logger });
 * ```
 */
export interface ILogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/**
 * Numeric rank of a level, used for threshold checks.
 */
export function getLogLevelRank(level: LogLevel): number {
  switch (level) {
    case LogLevel.Debug:
      return 0;
    case LogLevel.Info:
      return 1;
    case LogLevel.Warn:
      return 2;
    case LogLevel.Error:
      return 3;
    case LogLevel.Silent:
      return 4;
  }
}
