/**
 * @fileoverview ConsoleLogger - Console Adapter for ILogger
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 */

import { type ILogger, type LogFields, LogLevel, getLogLevelRank } from '../../domain/logging';

/**
 * ConsoleLogger - Writes through `console`, prefixed and level-filtered.
 *
 * @example
 * ```typescript
 * const provider = services.build({ logger: new ConsoleLogger(LogLevel.Debug) });
 * // [graphward] debug: Scope opened { scope: 'order-7', parent: 'root' }
 * ```
 */
export class ConsoleLogger implements ILogger {
  private readonly threshold: number;

  constructor(
    level: LogLevel = LogLevel.Warn,
    private readonly prefix = '[graphward]',
  ) {
    this.threshold = getLogLevelRank(level);
  }

  debug(message: string, fields?: LogFields): void {
    if (this.enabled(LogLevel.Debug)) {
      console.debug(...this.format(LogLevel.Debug, message, fields));
    }
  }

  info(message: string, fields?: LogFields): void {
    if (this.enabled(LogLevel.Info)) {
      console.info(...this.format(LogLevel.Info, message, fields));
    }
  }

  warn(message: string, fields?: LogFields): void {
    if (this.enabled(LogLevel.Warn)) {
      console.warn(...this.format(LogLevel.Warn, message, fields));
    }
  }

  error(message: string, fields?: LogFields): void {
    if (this.enabled(LogLevel.Error)) {
      console.error(...this.format(LogLevel.Error, message, fields));
    }
  }

  private enabled(level: LogLevel): boolean {
    return getLogLevelRank(level) >= this.threshold;
  }

  private format(level: LogLevel, message: string, fields?: LogFields): unknown[] {
    const line = `${this.prefix} ${level}: ${message}`;
    return fields === undefined ? [line] : [line, fields];
  }
}

/**
 * NoopLogger - Discards everything.
 */
export class NoopLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
