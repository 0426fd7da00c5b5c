/**
 * @fileoverview IServiceDescriptor - Binding Metadata
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A descriptor is one row of the registration table: the key, how to build
 * the value, which keys it needs, and how long the value lives.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  getInjectDependencies,
  getServiceName,
  isServiceIdentifier,
} from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Factory function type for creating service instances.
 *
 * @template T - The service instance type
 *
 * @remarks
 * A factory reads its dependencies from the resolver it is given. Only keys
 * declared in the registration's `inject` list are available, which lets the
 * graph be validated before any factory runs.
 *
 * @example Factory with dependencies
 * ```typescript
 * services.addScopedFactory(
 *   IGrill,
 *   (resolver) => new FlatTopGrill(resolver.resolve(IOven)),
 *   { inject: [IOven] },
 * );
 * ```
 *
 * @example Async factory
 * ```typescript
 * services.addSingletonFactory(IPantry, async () => {
 *   const pantry = new Pantry();
 *   await pantry.stock();
 *   return pantry;
 * });
 *
 * const pantry = await provider.resolveAsync(IPantry);
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T | Promise<T>;

/**
 * Minimal resolver interface handed to factories.
 */
export interface IServiceResolver {
  /**
   * Get a declared dependency.
   *
   * @throws UndeclaredDependencyError if the key is not in the `inject` list
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Get a declared dependency, or `undefined` if it was not declared.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;
}

/**
 * IServiceDescriptor - Complete metadata for a registered binding.
 *
 * @template T - The service instance type
 *
 * @remarks
 * **Invariants:**
 *
 * - Exactly one of `implementationType` and `factory` is set
 * - `dependencies` is fixed at creation: the class's `static inject`, or the
 *   factory's `inject` option
 */
export interface IServiceDescriptor<T = unknown> {
  /**
   * The key used when calling `resolve()`.
   */
  readonly serviceIdentifier: ServiceIdentifier<T>;

  /**
   * Which cache keeps the instance.
   */
  readonly lifetime: ServiceLifetime;

  /**
   * Implementation class, constructed with `dependencies` as arguments.
   */
  readonly implementationType?: Constructor<T> | undefined;

  /**
   * Factory closure, called with a resolver over `dependencies`.
   */
  readonly factory?: ServiceFactory<T> | undefined;

  /**
   * Keys this binding needs, in argument order.
   */
  readonly dependencies: readonly ServiceIdentifier[];

  /**
   * Optional human-readable name for debugging.
   */
  readonly name?: string | undefined;

  /**
   * Optional tags for discovery through `resolveByTag()`.
   */
  readonly tags?: readonly string[] | undefined;

  /**
   * Custom metadata for application-specific purposes.
   */
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Options accepted by every registration method.
 */
export interface IServiceDescriptorOptions {
  /**
   * Tags for service discovery.
   */
  tags?: string[];

  /**
   * Custom metadata.
   */
  metadata?: Record<string, unknown>;

  /**
   * Human-readable name.
   */
  name?: string;
}

/**
 * Options for factory registrations.
 */
export interface IFactoryDescriptorOptions extends IServiceDescriptorOptions {
  /**
   * Keys the factory reads from its resolver.
   */
  inject?: readonly ServiceIdentifier[];
}

/**
 * Create a descriptor for a class-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createClassDescriptor(IBread, ServiceLifetime.Scoped, Sourdough, {
 *   tags: ['bread'],
 * });
 * ```
 */
export function createClassDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  implementationType: Constructor<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    implementationType,
    dependencies: getInjectDependencies(implementationType),
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for a factory-based registration.
 */
export function createFactoryDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<T>,
  options?: IFactoryDescriptorOptions,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime,
    factory,
    dependencies: options?.inject ?? [],
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Create a descriptor for a pre-built instance.
 *
 * @remarks
 * Instance registrations are always Singleton: the instance already exists
 * and belongs to the scope it was registered in.
 */
export function createInstanceDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  instance: T,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return {
    serviceIdentifier,
    lifetime: ServiceLifetime.Singleton,
    factory: () => instance,
    dependencies: [],
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  };
}

/**
 * Validate a descriptor's shape.
 *
 * @throws TypeError if the descriptor is malformed
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const hasImplementation = descriptor.implementationType !== undefined;
  const hasFactory = descriptor.factory !== undefined;

  if (hasImplementation === hasFactory) {
    throw new TypeError(
      `Descriptor for '${name}' must have exactly one of implementationType or factory`,
    );
  }

  if (hasImplementation && typeof descriptor.implementationType !== 'function') {
    throw new TypeError(`implementationType for '${name}' must be a constructor function`);
  }

  if (hasFactory && typeof descriptor.factory !== 'function') {
    throw new TypeError(`factory for '${name}' must be a function`);
  }

  const badDependency = descriptor.dependencies.findIndex((dep) => !isServiceIdentifier(dep));
  if (badDependency !== -1) {
    throw new TypeError(
      `Dependency #${badDependency} of '${name}' is not a valid service identifier ` +
        '(was it declared before the class it refers to?)',
    );
  }
}

/**
 * Display name for a descriptor: explicit name, else the key's name.
 */
export function getDescriptorName(descriptor: IServiceDescriptor): string {
  return descriptor.name ?? getServiceName(descriptor.serviceIdentifier);
}
