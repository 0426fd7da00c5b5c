/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines WHAT the container does: registration, resolution and
 * scope lifecycle. The infrastructure layer decides HOW.
 *
 * ## Zero-Reflection DI Pattern
 *
 * Dependencies are declared, never inferred:
 *
 * ```typescript
 * class Blt {
 *   static inject = [Lettuce, Bacon] as const;
 *   constructor(readonly lettuce: Lettuce, readonly bacon: Bacon) {}
 * }
 * ```
 *
 * ## Explicit Scope Handles
 *
 * Scopes form a tree rooted at the provider. The host opens and closes them
 * at boundaries it controls and passes the handle to whoever resolves:
 *
 * ```
 * root ─────────────────────────────────────────────┐
 * │  IOven (Singleton)                               │
 * │                                                  │
 * │  session-42 ──────────────────────────────┐     │
 * │  │  Cart (Scoped)                         │     │
 * │  │                                        │     │
 * │  │  order-7 ───────────────────┐          │     │
 * │  │  │  Lettuce, Bacon (Scoped) │          │     │
 * │  │  └──────────────────────────┘          │     │
 * │  └────────────────────────────────────────┘     │
 * └─────────────────────────────────────────────────┘
 * ```
 *
 * @version 1.0.0
 */

import { type ILogger } from '../logging';

import { type IResolutionPlan } from './resolution-plan';
import {
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type IFactoryDescriptorOptions,
  type ServiceFactory,
} from './service-descriptor';
import { type ServiceIdentifier, type Constructor } from './service-identifier';

// ============================================================================
// IDisposable - Release Hook
// ============================================================================

/**
 * Interface for objects that need cleanup when their scope closes.
 *
 * @remarks
 * - Scoped instances: released when the resolving scope closes
 * - Singleton instances: released when the owning scope closes
 * - Transient instances: never tracked
 *
 * Release runs newest-first. A failing release is logged and does not stop
 * the others.
 *
 * @example
 * ```typescript
 * class FryerConnection implements IDisposable {
 *   async dispose(): Promise<void> {
 *     await this.socket.end();
 *   }
 * }
 * ```
 */
export interface IDisposable {
  /**
   * Release resources held by this object.
   */
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return typeof obj === 'object' && obj !== null && 'dispose' in obj && typeof obj.dispose === 'function';
}

// ============================================================================
// IAttachable - Two-Phase Construction
// ============================================================================

/**
 * Objects the host constructs without arguments, completed by `attach()`.
 *
 * @remarks
 * Between construction and `scope.attach(target)` the object is invalid and
 * must not be used. The class declares its dependencies with `static inject`
 * exactly as a constructor-injected class would:
 *
 * ```typescript
 * class CheckoutScreen implements IAttachable {
 *   static inject = [Cart, IPayments] as const;
 *
 *   private deps?: { cart: Cart; payments: IPayments };
 *
 *   attach(cart: Cart, payments: IPayments): void {
 *     this.deps = { cart, payments };
 *   }
 * }
 *
 * const screen = host.createScreen(CheckoutScreen); // no-arg construction
 * scope.attach(screen);                            // now valid
 * ```
 */
export interface IAttachable {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  attach(...dependencies: any[]): void;
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Fluent registration API over one binding layer.
 *
 * @remarks
 * The root layer is configured through {@link IServiceCollection}; a child
 * scope's layer through the `configure` callback of {@link IScopeOptions}.
 */
export interface IServiceRegistrar {
  addSingleton<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addSingleton<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addSingletonFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this;
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T, options?: IServiceDescriptorOptions): this;

  addScoped<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addScoped<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addScopedFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this;

  addTransient<T>(implementation: Constructor<T>, options?: IServiceDescriptorOptions): this;
  addTransient<T>(
    identifier: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addTransientFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IFactoryDescriptorOptions,
  ): this;

  /**
   * Register a prepared descriptor.
   *
   * @throws ConflictError if the key is already bound at this level
   * @throws ContainerSealedError once the layer is sealed
   */
  add<T>(descriptor: IServiceDescriptor<T>): this;

  /**
   * Check if a key is bound at this level.
   */
  has(identifier: ServiceIdentifier): boolean;

  /**
   * Descriptors of this level, in registration order.
   */
  getDescriptors(): readonly IServiceDescriptor[];
}

/**
 * Configuration phase of the root binding layer.
 *
 * @example
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
 */
export interface IServiceCollection extends IServiceRegistrar {
  /**
   * Seal the collection and build the provider.
   */
  build(options?: IBuildOptions): IServiceProvider;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Operations shared by the provider and every scope.
 */
export interface IServiceResolution {
  /**
   * Resolve a key synchronously.
   *
   * @throws UnboundKeyError if the key or one of its dependencies is unbound
   * @throws CyclicDependencyError if the graph has a cycle
   * @throws ScopeMismatchError on a captive dependency
   * @throws ProviderFailure if a provider throws or returns a promise
   * @throws ScopeDisposedError if the scope is closed
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Resolve a key, awaiting asynchronous providers.
   *
   * @remarks
   * Concurrent first-time calls for the same cached key share one
   * construction.
   */
  resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T>;

  /**
   * Resolve a key, or return `undefined` if the key itself is unbound.
   *
   * @remarks
   * A missing dependency of a bound key still throws.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;

  /**
   * Resolve the nearest binding of a key as a list (empty if unbound).
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>): T[];

  /**
   * Resolve every visible binding carrying a tag, in registration order.
   */
  resolveByTag(tag: string): unknown[];

  /**
   * Check if a key is bound here or on an ancestor.
   */
  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Build (or fetch the memoised) plan for a key without constructing anything.
   */
  buildPlan(identifier: ServiceIdentifier): IResolutionPlan<IServiceScope>;

  /**
   * Complete a host-constructed object through its `attach()` method.
   *
   * @returns The same target
   */
  attach<T extends IAttachable>(target: T): T;
}

/**
 * IServiceProvider - The built container.
 *
 * @remarks
 * Owns the root scope. Resolving from the provider resolves from the root
 * scope, so scoped bindings resolved here live until the provider is
 * disposed.
 *
 * @example Per-request scope
 * ```typescript
 * const scope = provider.openScope(provider.rootScope, { name: `order-${id}` });
 * try {
 *   const blt = scope.resolve(Blt);
 *   await kitchen.serve(blt);
 * } finally {
 *   await provider.closeScope(scope);
 * }
 * ```
 */
export interface IServiceProvider extends IServiceResolution {
  /**
   * The root of the scope tree.
   */
  readonly rootScope: IServiceScope;

  /**
   * Open a child of the root scope.
   */
  createScope(options?: IScopeOptions): IServiceScope;

  /**
   * Open a child scope.
   *
   * @param parent - Parent scope, the root scope if omitted
   * @throws ScopeDisposedError if the parent is closed
   */
  openScope(parent?: IServiceScope, options?: IScopeOptions): IServiceScope;

  /**
   * Close a scope, releasing everything it cached.
   *
   * @throws AlreadyClosedError if the scope was closed before (no-op)
   * @throws ScopeOrderError if child scopes are still open
   */
  closeScope(handle: IServiceScope): Promise<void>;

  /**
   * Close every scope, root included, innermost first.
   */
  dispose(): Promise<void>;
}

/**
 * IServiceScope - A handle on one node of the scope tree.
 */
export interface IServiceScope extends IServiceResolution, IDisposable {
  /**
   * Unique, increasing id (root is 0).
   */
  readonly id: number;

  /**
   * Name used in logs and errors.
   */
  readonly name: string;

  /**
   * Parent scope; `undefined` for the root.
   */
  readonly parent: IServiceScope | undefined;

  /**
   * Open a child of this scope.
   */
  createScope(options?: IScopeOptions): IServiceScope;

  /**
   * Get the provider this scope belongs to.
   */
  getServiceProvider(): IServiceProvider;

  /**
   * Check if the scope has started closing.
   */
  isDisposed(): boolean;

  /**
   * Close this scope and any children still open, innermost first.
   *
   * @remarks
   * Unlike `closeScope`, this never reports order or double-close errors.
   */
  dispose(): Promise<void>;
}

/**
 * Factory for creating scopes, injectable through SERVICE_SCOPE_FACTORY_TOKEN.
 *
 * @example
 * ```typescript
 * class OrderWorker {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
 *
 *   constructor(private readonly scopes: IServiceScopeFactory) {}
 *
 *   async run(order: Order): Promise<void> {
 *     const scope = this.scopes.createScope({ name: `order-${order.id}` });
 *     try {
 *       await scope.resolve(OrderHandler).handle(order);
 *     } finally {
 *       await scope.dispose();
 *     }
 *   }
 * }
 * ```
 */
export interface IServiceScopeFactory {
  createScope(options?: IScopeOptions): IServiceScope;
}

/**
 * Token for IServiceScopeFactory.
 */
export const SERVICE_SCOPE_FACTORY_TOKEN = Symbol('IServiceScopeFactory');

// ============================================================================
// Options
// ============================================================================

/**
 * Options for opening a scope.
 */
export interface IScopeOptions {
  /**
   * Name for logs and errors. Defaults to `scope-<id>`.
   */
  name?: string;

  /**
   * Bindings visible only in the new scope and its descendants.
   *
   * @remarks
   * The layer is sealed when `openScope` returns.
   */
  configure?: (services: IServiceRegistrar) => void;
}

/**
 * Options for a registration layer.
 */
export interface IServiceCollectionOptions {
  /**
   * Let a later registration replace an earlier one for the same key.
   *
   * @remarks
   * Default: false (a duplicate raises ConflictError)
   */
  allowOverride?: boolean;
}

/**
 * Options for building the service provider.
 */
export interface IBuildOptions {
  /**
   * Reject captive dependencies (ScopeMismatchError).
   *
   * @remarks
   * Checked over the root layer at build time and over every plan.
   *
   * Default: true
   */
  validateScopes?: boolean;

  /**
   * Build a plan for every root binding during build().
   *
   * @remarks
   * Surfaces cycles and unbound keys at configuration time. Leave it off
   * when some keys are only bound in child scopes.
   *
   * Default: false
   */
  validateGraph?: boolean;

  /**
   * Construct every root Singleton during build().
   *
   * Default: false
   */
  eagerSingletons?: boolean;

  /**
   * Conflict policy for child-scope layers opened with `configure`.
   *
   * @remarks
   * Default: the collection's own `allowOverride`
   */
  allowOverride?: boolean;

  /**
   * Destination for lifecycle and release-failure logs.
   *
   * @remarks
   * Default: a ConsoleLogger at `warn`
   */
  logger?: ILogger;
}
