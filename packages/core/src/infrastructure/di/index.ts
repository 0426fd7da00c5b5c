/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete container implementations. Use these in your application's
 * composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { createServiceCollection } from '@graphward/core/infrastructure/di';
 *
 * const services = createServiceCollection();
 * services
 *   .addSingleton(IOven, GasOven)
 *   .addScoped(Lettuce)
 *   .addScoped(Bacon)
 *   .addTransient(Blt);
 *
 * const provider = services.build();
 *
 * const order = provider.openScope(provider.rootScope, { name: 'order-7' });
 * try {
 *   const blt = order.resolve(Blt);
 * } finally {
 *   await provider.closeScope(order);
 * }
 * ```
 */

// ============================================================================
// Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';
export { ServiceRegistrar } from './service-registrar';
export {
  BindingRegistry,
  type IBinding,
  type IBindingLookup,
  type IBindingRegistryOptions,
} from './binding-registry';

// ============================================================================
// Resolution
// ============================================================================

export { ServiceProvider } from './service-provider';
export { PlanBuilder, type IPlanBuilderOptions, type ScopePlan, type ScopePlanStep } from './plan-builder';
export { Injector } from './injector';

// ============================================================================
// Scopes
// ============================================================================

export { ScopedContainer, withScope, type ScopeState } from './scoped-container';
export { ScopeManager, type IScopeManagerOptions } from './scope-manager';
