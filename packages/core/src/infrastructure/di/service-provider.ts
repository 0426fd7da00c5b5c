/**
 * @fileoverview ServiceProvider - Container Facade
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Wires the pieces together and owns the root scope:
 *
 * ```
 * ServiceProvider
 *   ├─ PlanBuilder   key -> validated, ordered plan
 *   ├─ Injector      plan -> instances, through scope caches
 *   ├─ ScopeManager  open / close scopes
 *   └─ rootScope     ScopedContainer over the sealed root layer
 * ```
 *
 * ## Resolution Algorithm
 *
 * ```
 * scope.resolve(key)
 *   1. Plan memoised in the scope? else PlanBuilder.buildPlan([key], scope)
 *      (cycles, unbound keys and captive dependencies fail here)
 *   2. Injector.execute(plan)
 *      - Singleton: cached in the scope owning the binding
 *      - Scoped:    cached in the resolving scope
 *      - Transient: built once per call
 *   3. Return the root instance
 * ```
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IAttachable,
  type IBuildOptions,
  type IScopeOptions,
  type IServiceProvider,
  type IServiceScope,
  ServiceLifetime,
  canDependOn,
  getServiceName,
  ScopeMismatchError,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';
import { ConsoleLogger } from '../logging';

import { type BindingRegistry } from './binding-registry';
import { Injector } from './injector';
import { PlanBuilder, type ScopePlan } from './plan-builder';
import { ScopeManager } from './scope-manager';
import { ScopedContainer } from './scoped-container';

/**
 * ServiceProvider - IServiceProvider implementation.
 *
 * @remarks
 * **Lifecycle Management:**
 *
 * - Singleton: cached in the scope that owns the binding (root for
 *   `ServiceCollection` registrations)
 * - Scoped: cached in each scope that resolves it
 * - Transient: never cached
 *
 * Resolving from the provider resolves from the root scope.
 *
 * @example
 * ```typescript
 * const provider = services.build({ logger: new ConsoleLogger(LogLevel.Debug) });
 *
 * const order = provider.openScope(provider.rootScope, { name: 'order-7' });
 * const first = order.resolve(Blt);
 * const second = order.resolve(Blt);
 * first.lettuce === second.lettuce; // true
 * await provider.closeScope(order);
 * ```
 */
export class ServiceProvider implements IServiceProvider {
  /** @internal */
  readonly planner: PlanBuilder;

  /** @internal */
  readonly injector: Injector;

  /** @internal */
  readonly scopes: ScopeManager;

  /** @internal */
  readonly logger: ILogger;

  readonly rootScope: ScopedContainer;

  /**
   * Normalised build options.
   */
  private readonly options: Required<IBuildOptions>;

  constructor(bindings: BindingRegistry, options?: IBuildOptions) {
    this.options = {
      validateScopes: options?.validateScopes ?? true,
      validateGraph: options?.validateGraph ?? false,
      eagerSingletons: options?.eagerSingletons ?? false,
      allowOverride: options?.allowOverride ?? false,
      logger: options?.logger ?? new ConsoleLogger(),
    };

    this.logger = this.options.logger;
    this.planner = new PlanBuilder({
      validateScopes: this.options.validateScopes,
      logger: this.logger,
    });
    this.injector = new Injector(this.logger);
    this.scopes = new ScopeManager({
      allowOverride: this.options.allowOverride,
      logger: this.logger,
    });
    this.rootScope = this.scopes.createRoot(this, bindings);

    // Validate scopes at build time
    if (this.options.validateScopes) {
      this.validateScopeDependencies();
    }

    if (this.options.validateGraph) {
      this.validateGraph();
    }

    // Eager singleton creation
    if (this.options.eagerSingletons) {
      this.createEagerSingletons();
    }
  }

  // ============================================================================
  // IServiceResolution (root scope)
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.rootScope.resolve(identifier);
  }

  resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    return this.rootScope.resolveAsync(identifier);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    return this.rootScope.tryResolve(identifier);
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    return this.rootScope.resolveAll(identifier);
  }

  resolveByTag(tag: string): unknown[] {
    return this.rootScope.resolveByTag(tag);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.rootScope.isRegistered(identifier);
  }

  buildPlan(identifier: ServiceIdentifier): ScopePlan {
    return this.rootScope.buildPlan(identifier);
  }

  attach<T extends IAttachable>(target: T): T {
    return this.rootScope.attach(target);
  }

  // ============================================================================
  // Scope Lifecycle
  // ============================================================================

  createScope(options?: IScopeOptions): ScopedContainer {
    return this.openScope(this.rootScope, options);
  }

  openScope(parent?: IServiceScope, options?: IScopeOptions): ScopedContainer {
    return this.scopes.openScope(this, this.own(parent ?? this.rootScope), options);
  }

  async closeScope(handle: IServiceScope): Promise<void> {
    await this.scopes.closeScope(this.own(handle));
  }

  /**
   * Close every scope, root included, innermost first.
   */
  async dispose(): Promise<void> {
    await this.scopes.disposeTree(this.rootScope);
  }

  // ============================================================================
  // Validation
  // ============================================================================

  /**
   * Narrow a handle to a scope of this provider.
   */
  private own(handle: IServiceScope): ScopedContainer {
    if (!(handle instanceof ScopedContainer) || !handle.belongsTo(this)) {
      throw new TypeError(`Scope '${handle.name}' was not created by this provider`);
    }
    return handle;
  }

  /**
   * Check every root binding's direct dependencies for captive lifetimes.
   *
   * @remarks
   * Keys not bound at the root may be bound in child scopes; plans check
   * those when they are built.
   */
  private validateScopeDependencies(): void {
    for (const { descriptor } of this.rootScope.bindings.list()) {
      for (const dep of descriptor.dependencies) {
        const found = this.rootScope.bindings.find(dep);
        if (!found) {
          continue;
        }

        if (!canDependOn(descriptor.lifetime, found.descriptor.lifetime)) {
          throw new ScopeMismatchError(
            descriptor.serviceIdentifier,
            dep,
            descriptor.lifetime,
            found.descriptor.lifetime,
            [getServiceName(descriptor.serviceIdentifier)],
          );
        }
      }
    }
  }

  /**
   * Plan every root binding, surfacing cycles and unbound keys now.
   */
  private validateGraph(): void {
    for (const { descriptor } of this.rootScope.bindings.list()) {
      this.rootScope.buildPlan(descriptor.serviceIdentifier);
    }
  }

  /**
   * Construct every root Singleton.
   */
  private createEagerSingletons(): void {
    for (const { descriptor } of this.rootScope.bindings.list()) {
      if (descriptor.lifetime === ServiceLifetime.Singleton) {
        this.rootScope.resolve(descriptor.serviceIdentifier);
      }
    }
  }
}
