/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @module @graphward/core/infrastructure/logging
 * @license Apache-2.0
 */

export { ConsoleLogger, NoopLogger } from './console-logger';
