/**
 * @fileoverview Infrastructure Layer Exports
 *
 * Adapters behind the domain contracts: the container itself and the
 * console logger.
 *
 * @module @graphward/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection implementation
// ============================================================================
export * from './di';

// ============================================================================
// Logging - ILogger adapters
// ============================================================================
export * from './logging';
