/**
 * @fileoverview ServiceRegistrar - Fluent Registration over a Binding Layer
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Shared by the root `ServiceCollection` and the `configure` callback of
 * child scopes.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type IFactoryDescriptorOptions,
  type ServiceFactory,
  type IServiceRegistrar,
  ServiceLifetime,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  validateDescriptor,
} from '../../domain/di';

import { type BindingRegistry } from './binding-registry';

/**
 * ServiceRegistrar - IServiceRegistrar over one BindingRegistry layer.
 *
 * @remarks
 * Each class registration has two overloads:
 * 1. Self-registration: `addScoped(Lettuce)`
 * 2. Key-to-implementation: `addScoped(IBread, Sourdough)`
 *
 * Both accept trailing descriptor options (`name`, `tags`, `metadata`).
 */
export class ServiceRegistrar implements IServiceRegistrar {
  constructor(protected readonly registry: BindingRegistry) {}

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  addSingleton<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addSingleton<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addSingleton<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementationOrOptions?: Constructor<T> | IServiceDescriptorOptions,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.addClass(ServiceLifetime.Singleton, identifierOrImpl, implementationOrOptions, options);
  }

  addSingletonFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this {
    return this.add(createFactoryDescriptor(identifier, ServiceLifetime.Singleton, factory, options));
  }

  addSingletonInstance<T>(
    identifier: ServiceIdentifier<T>,
    instance: T,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.add(createInstanceDescriptor(identifier, instance, options));
  }

  // ============================================================================
  // Scoped Registration
  // ============================================================================

  addScoped<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addScoped<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addScoped<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementationOrOptions?: Constructor<T> | IServiceDescriptorOptions,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.addClass(ServiceLifetime.Scoped, identifierOrImpl, implementationOrOptions, options);
  }

  addScopedFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this {
    return this.add(createFactoryDescriptor(identifier, ServiceLifetime.Scoped, factory, options));
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  addTransient<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addTransient<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addTransient<T>(
    identifierOrImpl: ServiceIdentifier<T>,
    implementationOrOptions?: Constructor<T> | IServiceDescriptorOptions,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.addClass(ServiceLifetime.Transient, identifierOrImpl, implementationOrOptions, options);
  }

  addTransientFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this {
    return this.add(createFactoryDescriptor(identifier, ServiceLifetime.Transient, factory, options));
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Register a prepared descriptor.
   */
  add<T>(descriptor: IServiceDescriptor<T>): this {
    validateDescriptor(descriptor);
    this.registry.register(descriptor);
    return this;
  }

  has(identifier: ServiceIdentifier): boolean {
    return this.registry.has(identifier);
  }

  getDescriptors(): readonly IServiceDescriptor[] {
    return this.registry.list().map((binding) => binding.descriptor);
  }

  /**
   * Get the descriptor bound to a key at this level.
   */
  getDescriptor(identifier: ServiceIdentifier): IServiceDescriptor | undefined {
    return this.registry.get(identifier)?.descriptor;
  }

  /**
   * Descriptors at this level carrying a tag, in registration order.
   */
  getDescriptorsByTag(tag: string): readonly IServiceDescriptor[] {
    return this.getDescriptors().filter((descriptor) => descriptor.tags?.includes(tag) ?? false);
  }

  /**
   * Remove a registration.
   */
  remove(identifier: ServiceIdentifier): boolean {
    return this.registry.remove(identifier);
  }

  /**
   * Remove all registrations.
   */
  clear(): void {
    this.registry.clear();
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Normalize the two class-registration overloads.
   */
  private addClass<T>(
    lifetime: ServiceLifetime,
    identifierOrImpl: ServiceIdentifier<T>,
    implementationOrOptions: Constructor<T> | IServiceDescriptorOptions | undefined,
    options: IServiceDescriptorOptions | undefined,
  ): this {
    // Pattern: add*(Identifier, Implementation, options?)
    if (typeof implementationOrOptions === 'function') {
      return this.add(createClassDescriptor(identifierOrImpl, lifetime, implementationOrOptions, options));
    }

    // Pattern: add*(Implementation, options?) - self-registration
    if (typeof identifierOrImpl === 'function') {
      return this.add(createClassDescriptor(identifierOrImpl, lifetime, identifierOrImpl, implementationOrOptions));
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or (identifier, implementation), ` +
        `got ${typeof identifierOrImpl}`,
    );
  }
}
