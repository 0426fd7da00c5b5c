/**
 * @fileoverview @graphward/core - Main Entry Point
 *
 * Graphward Core
 * Zero-reflection dependency injection with validated resolution plans and
 * explicit, nestable lifetime scopes.
 *
 * @packageDocumentation
 * @module @graphward/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { createServiceCollection, createToken } from '@graphward/core';
 *
 * interface IOven { bake(bread: string): string; }
 * const IOven = createToken<IOven>('IOven');
 *
 * class Lettuce {}
 * class Bacon {}
 * class Blt {
 *   static inject = [Lettuce, Bacon] as const;
 *   constructor(readonly lettuce: Lettuce, readonly bacon: Bacon) {}
 * }
 *
 * const services = createServiceCollection();
 * services.addSingleton(IOven, GasOven).addScoped(Lettuce).addScoped(Bacon).addTransient(Blt);
 *
 * const provider = services.build();
 * const order = provider.openScope(provider.rootScope, { name: 'order-1' });
 * const blt = order.resolve(Blt);
 * await provider.closeScope(order);
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Contracts only - NO infrastructure dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Infrastructure Layer Exports
// Container implementation, logger adapters
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
