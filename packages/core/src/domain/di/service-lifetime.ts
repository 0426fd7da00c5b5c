/**
 * @fileoverview ServiceLifetime - Instance Lifetimes
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Lifetimes decide which scope cache, if any, keeps an instance.
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created and released.
 *
 * @remarks
 * **Lifecycle Overview:**
 *
 * | Lifetime | Cached in | Shared | Released |
 * |----------|-----------|--------|----------|
 * | Singleton | Scope that owns the binding | Whole owning subtree | Owning scope closes |
 * | Scoped | Scope doing the resolving | Within that scope | That scope closes |
 * | Transient | Nowhere | Within one resolve call | Never (GC) |
 *
 * For bindings registered on the root collection the owning scope is the
 * root scope, which closes when the provider is disposed.
 *
 * **Dependency Rules:**
 *
 * - ✅ Singleton can inject: Singleton
 * - ✅ Scoped can inject: Singleton, Scoped
 * - ✅ Transient can inject: Singleton, Scoped, Transient
 * - ❌ Singleton CANNOT inject: Scoped, Transient
 * - ❌ Scoped CANNOT inject: Transient
 *
 * @example
 * ```typescript
 * services
 *   .addSingleton(IOven, GasOven)   // one per owning scope
 *   .addScoped(Lettuce)             // one per scope
 *   .addTransient(Blt);             // one per resolve
 * ```
 */
export enum ServiceLifetime {
  /**
   * One instance per owning scope.
   *
   * @remarks
   * Dependencies of a singleton are looked up from the owning scope, never
   * from the (possibly deeper) scope that asked for it.
   */
  Singleton = 'singleton',

  /**
   * One instance per resolving scope ("singleton, scope-cached").
   *
   * @remarks
   * Sibling scopes each get their own instance. Instances implementing
   * `IDisposable` are released, newest first, when the scope closes.
   */
  Scoped = 'scoped',

  /**
   * A new instance for every resolve call.
   *
   * @remarks
   * Within a single call the instance is shared by every dependent in the
   * object graph; two calls never share.
   */
  Transient = 'transient',
}

/**
 * Get the priority of a lifetime (higher = shorter lived).
 *
 * @internal
 */
export function getLifetimePriority(lifetime: ServiceLifetime): number {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 0;
    case ServiceLifetime.Scoped:
      return 1;
    case ServiceLifetime.Transient:
      return 2;
  }
}

/**
 * Check if a service with `from` lifetime can depend on a service with `to` lifetime.
 *
 * @example
 * ```typescript
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Scoped); // false
 * canDependOn(ServiceLifetime.Transient, ServiceLifetime.Scoped); // true
 * ```
 */
export function canDependOn(from: ServiceLifetime, to: ServiceLifetime): boolean {
  // Longer-lived services must not capture shorter-lived ones
  return getLifetimePriority(from) >= getLifetimePriority(to);
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
  }
}
