/**
 * @fileoverview ScopedContainer - One Node of the Scope Tree
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A scope owns a binding layer, an instance cache, an in-flight table for
 * asynchronous constructions, the disposables it must release and the plans
 * it has built.
 *
 * ```
 * ScopedContainer 'order-7' ────────────────────────┐
 * │  bindings:  [ ISauce -> Aioli ] ─> parent layer  │
 * │  cache:     Lettuce -> #1, Bacon -> #2           │
 * │  inFlight:  IPantry -> Promise                   │
 * │  plans:     Blt -> [Lettuce, Bacon, Blt]         │
 * └──────────────────────────────────────────────────┘
 * ```
 *
 * **Lifecycle:**
 *
 * 1. `provider.openScope(parent)` creates the scope, its layer is sealed
 * 2. Resolutions fill the cache
 * 3. `provider.closeScope(scope)` waits for in-flight work, releases the
 *    disposables newest-first and clears the cache
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IAttachable,
  type IDisposable,
  type IScopeOptions,
  type IServiceProvider,
  type IServiceScope,
  type IServiceScopeFactory,
  getAttachDependencies,
  isDisposable,
  ScopeDisposedError,
  UnboundKeyError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from '../../domain/di';

import { type BindingRegistry } from './binding-registry';
import type { ScopePlan } from './plan-builder';
import type { ServiceProvider } from './service-provider';

/**
 * Lifecycle state of a scope.
 */
export type ScopeState = 'open' | 'closing' | 'closed';

/**
 * ScopedContainer - IServiceScope implementation.
 *
 * @remarks
 * **Responsibilities:**
 *
 * 1. Look keys up through its binding layer
 * 2. Cache Scoped instances it resolves and Singletons it owns
 * 3. Single-flight asynchronous constructions of those instances
 * 4. Memoise plans until it closes
 *
 * Planning and construction are delegated to the provider's PlanBuilder
 * and Injector; opening and closing to its ScopeManager.
 *
 * @example
 * ```typescript
 * const order = provider.openScope(provider.rootScope, { name: 'order-7' });
 * try {
 *   const blt = order.resolve(Blt);
 *   await kitchen.serve(blt);
 * } finally {
 *   await provider.closeScope(order);
 * }
 * ```
 */
export class ScopedContainer implements IServiceScope {
  private currentState: ScopeState = 'open';

  /**
   * Set once a close or dispose of this scope has started.
   */
  private closeTask: Promise<void> | undefined;

  private readonly childScopes = new Set<ScopedContainer>();

  private readonly cache = new Map<ServiceIdentifier, unknown>();

  private readonly inFlight = new Map<ServiceIdentifier, Promise<unknown>>();

  /**
   * Cached instances with a release hook, in creation order.
   */
  private readonly disposables: IDisposable[] = [];

  private readonly plans = new Map<ServiceIdentifier, ScopePlan>();

  private readonly attachPlans = new Map<unknown, ScopePlan>();

  private readonly scopeFactory: IServiceScopeFactory = {
    createScope: (options?: IScopeOptions) => this.createScope(options),
  };

  constructor(
    private readonly provider: ServiceProvider,
    readonly id: number,
    readonly name: string,
    readonly bindings: BindingRegistry,
    readonly parent: ScopedContainer | undefined = undefined,
  ) {}

  // ============================================================================
  // IServiceScope Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    this.ensureOpen();
    const [instance] = this.provider.injector.execute(this.planFor(identifier));
    return instance as T;
  }

  async resolveAsync<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    this.ensureOpen();
    const [instance] = await this.provider.injector.executeAsync(this.planFor(identifier));
    return instance as T;
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    try {
      return this.resolve(identifier);
    } catch (error) {
      // A missing dependency of a bound key is still a configuration error
      if (error instanceof UnboundKeyError && error.serviceIdentifier === identifier) {
        return undefined;
      }
      throw error;
    }
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>): T[] {
    return this.isRegistered(identifier) ? [this.resolve(identifier)] : [];
  }

  resolveByTag(tag: string): unknown[] {
    this.ensureOpen();
    return this.bindings
      .visible()
      .filter((binding) => binding.descriptor.tags?.includes(tag) ?? false)
      .map((binding) => this.resolve(binding.descriptor.serviceIdentifier));
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.getBuiltin(identifier) !== undefined || this.bindings.find(identifier) !== undefined;
  }

  buildPlan(identifier: ServiceIdentifier): ScopePlan {
    this.ensureOpen();
    return this.planFor(identifier);
  }

  /**
   * Complete a host-constructed object.
   *
   * @remarks
   * The plan covers the keys in the target class's `static inject` list and
   * is validated before anything is constructed.
   */
  attach<T extends IAttachable>(target: T): T {
    this.ensureOpen();

    const ctor: unknown = target.constructor;
    let plan = this.attachPlans.get(ctor);
    if (!plan) {
      plan = this.provider.planner.buildPlan(getAttachDependencies(target), this);
      this.attachPlans.set(ctor, plan);
    }

    target.attach(...this.provider.injector.execute(plan));
    return target;
  }

  createScope(options?: IScopeOptions): IServiceScope {
    return this.provider.openScope(this, options);
  }

  getServiceProvider(): ServiceProvider {
    return this.provider;
  }

  isDisposed(): boolean {
    return this.currentState !== 'open';
  }

  /**
   * Close this scope and its open descendants, innermost first.
   */
  async dispose(): Promise<void> {
    await this.provider.scopes.disposeTree(this);
  }

  // ============================================================================
  // Tree Navigation
  // ============================================================================

  get state(): ScopeState {
    return this.currentState;
  }

  get children(): readonly ScopedContainer[] {
    return Array.from(this.childScopes);
  }

  /**
   * The scope `depth` levels up (0 is this scope).
   */
  ancestor(depth: number): ScopedContainer {
    let scope: ScopedContainer = this;
    for (let i = 0; i < depth; i++) {
      if (!scope.parent) {
        throw new RangeError(`Scope '${this.name}' has no ancestor ${depth} levels up`);
      }
      scope = scope.parent;
    }
    return scope;
  }

  /**
   * Value of a key every scope provides without a binding.
   */
  getBuiltin(identifier: ServiceIdentifier): unknown {
    if (identifier === SERVICE_SCOPE_TOKEN) {
      return this;
    }
    if (identifier === SERVICE_PROVIDER_TOKEN) {
      return this.provider;
    }
    if (identifier === SERVICE_SCOPE_FACTORY_TOKEN) {
      return this.scopeFactory;
    }
    return undefined;
  }

  /**
   * Check whether this scope belongs to a provider.
   */
  belongsTo(provider: ServiceProvider): boolean {
    return this.provider === provider;
  }

  // ============================================================================
  // Cache (used by Injector)
  // ============================================================================

  /** @internal */
  hasCached(identifier: ServiceIdentifier): boolean {
    return this.cache.has(identifier);
  }

  /** @internal */
  getCached(identifier: ServiceIdentifier): unknown {
    return this.cache.get(identifier);
  }

  /**
   * Cache an instance, tracking it for release if it has a release hook.
   * @internal
   */
  store(identifier: ServiceIdentifier, instance: unknown): void {
    this.cache.set(identifier, instance);
    if (isDisposable(instance)) {
      this.disposables.push(instance);
    }
  }

  /** @internal */
  getInFlight(identifier: ServiceIdentifier): Promise<unknown> | undefined {
    return this.inFlight.get(identifier);
  }

  /**
   * Record a construction until it settles.
   * @internal
   */
  trackInFlight(identifier: ServiceIdentifier, construction: Promise<unknown>): void {
    this.inFlight.set(identifier, construction);

    const settle = (): void => {
      if (this.inFlight.get(identifier) === construction) {
        this.inFlight.delete(identifier);
      }
    };
    void construction.then(settle, settle);
  }

  /**
   * Run an instance's release hook, logging a failure.
   * @internal
   */
  async release(instance: unknown): Promise<void> {
    if (!isDisposable(instance)) {
      return;
    }

    try {
      await instance.dispose();
    } catch (error) {
      this.provider.logger.error('Release hook failed', {
        scope: this.name,
        instance: describe(instance),
        error,
      });
    }
  }

  // ============================================================================
  // Lifecycle (used by ScopeManager)
  // ============================================================================

  /** @internal */
  adopt(child: ScopedContainer): void {
    this.childScopes.add(child);
  }

  /**
   * The close or dispose under way, if any.
   * @internal
   */
  get pendingClose(): Promise<void> | undefined {
    return this.closeTask;
  }

  /** @internal */
  trackClose(task: Promise<void>): void {
    this.closeTask = task;
  }

  /** @internal */
  beginClose(): void {
    this.currentState = 'closing';
  }

  /**
   * Wait for every construction started before closing.
   * @internal
   */
  async settleInFlight(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight.values()));
  }

  /**
   * Hand over the disposables, newest first.
   * @internal
   */
  takeDisposables(): IDisposable[] {
    const taken = [...this.disposables].reverse();
    this.disposables.length = 0;
    return taken;
  }

  /** @internal */
  finishClose(): void {
    this.cache.clear();
    this.inFlight.clear();
    this.plans.clear();
    this.attachPlans.clear();
    this.parent?.childScopes.delete(this);
    this.currentState = 'closed';
  }

  /**
   * Throw unless the scope is open.
   * @internal
   */
  ensureOpen(): void {
    if (this.currentState !== 'open') {
      throw new ScopeDisposedError(this.name);
    }
  }

  /**
   * Throw unless children may still be opened under this scope.
   * @internal
   */
  ensureAcceptsChildren(): void {
    if (this.currentState !== 'open' || this.closeTask) {
      throw new ScopeDisposedError(this.name);
    }
  }

  private planFor(identifier: ServiceIdentifier): ScopePlan {
    let plan = this.plans.get(identifier);
    if (!plan) {
      plan = this.provider.planner.buildPlan([identifier], this);
      this.plans.set(identifier, plan);
    }
    return plan;
  }
}

function describe(instance: object): string {
  const ctor: unknown = instance.constructor;
  return typeof ctor === 'function' ? ctor.name : 'object';
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Run a function within a new child of the root scope.
 *
 * @remarks
 * The scope is disposed whether the callback succeeds or fails.
 *
 * @example
 * ```typescript
 * const receipt = await withScope(provider, async (scope) => {
 *   const till = scope.resolve(Till);
 *   return till.ring(order);
 * });
 * ```
 */
export async function withScope<T>(
  provider: IServiceProvider,
  callback: (scope: IServiceScope) => T | Promise<T>,
  options?: IScopeOptions,
): Promise<T> {
  const scope = provider.createScope(options);
  try {
    return await callback(scope);
  } finally {
    await scope.dispose();
  }
}
