/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the container's contracts. NO infrastructure
 * dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @graphward/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';

// ============================================================================
// Logging - Logger port
// ============================================================================
export * from './logging';
