/**
 * @fileoverview Domain Logging Module Exports
 *
 * @module @graphward/core/domain/logging
 * @license Apache-2.0
 */

export { type ILogger, type LogFields, LogLevel, getLogLevelRank } from './logger.interface';
