/**
 * @fileoverview ServiceCollection - Root Registration and Build
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The configuration phase of the root binding layer. `build()` seals the
 * layer and hands it to a new {@link ServiceProvider}.
 *
 * @version 1.0.0
 */

import {
  type IServiceCollection,
  type IServiceCollectionOptions,
  type IBuildOptions,
} from '../../domain/di';

import { BindingRegistry } from './binding-registry';
import { ServiceProvider } from './service-provider';
import { ServiceRegistrar } from './service-registrar';

/**
 * ServiceCollection - Fluent API for root registrations.
 *
 * @remarks
 * **Usage Pattern:**
 *
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services
 *   .addSingleton(IOven, GasOven)
 *   .addScoped(Lettuce)
 *   .addScoped(Bacon)
 *   .addTransient(Blt);
 *
 * const provider = services.build();
 * ```
 *
 * Registering a key twice raises ConflictError unless the collection was
 * created with `{ allowOverride: true }`, in which case the last
 * registration wins.
 *
 * @example Interface tokens and factories
 * ```typescript
 * const ISauce = createToken<ISauce>('ISauce');
 *
 * services
 *   .addSingletonInstance(KitchenConfig, { fryerTemp: 180 })
 *   .addScoped(ISauce, Mayonnaise, { tags: ['condiment'] })
 *   .addScopedFactory(IFryer, (r) => new Fryer(r.resolve(KitchenConfig)), {
 *     inject: [KitchenConfig],
 *   });
 * ```
 */
export class ServiceCollection extends ServiceRegistrar implements IServiceCollection {
  private readonly allowOverride: boolean;

  constructor(options?: IServiceCollectionOptions) {
    super(new BindingRegistry('root', undefined, options));
    this.allowOverride = options?.allowOverride ?? false;
  }

  /**
   * Check if build() has been called.
   */
  isSealed(): boolean {
    return this.registry.isSealed();
  }

  /**
   * Seal the collection and build the provider.
   *
   * @throws ScopeMismatchError if a root binding captures a shorter-lived one
   */
  build(options?: IBuildOptions): ServiceProvider {
    this.registry.seal();

    return new ServiceProvider(this.registry, {
      ...options,
      allowOverride: options?.allowOverride ?? this.allowOverride,
    });
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a new ServiceCollection.
 *
 * @example
 * ```typescript
 * const services = createServiceCollection();
 * services.addSingleton(GasOven);
 * const provider = services.build();
 * ```
 */
export function createServiceCollection(options?: IServiceCollectionOptions): ServiceCollection {
  return new ServiceCollection(options);
}
