/**
 * @fileoverview Injector - Plan Execution
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Walks a validated plan and produces the root instances.
 *
 * ## Execution
 *
 * ```
 * execute(plan)
 *   1. Walk back from the roots, marking the steps whose value is needed
 *      (a step already cached does not need its dependencies)
 *   2. Walk forward through the marked steps:
 *      - cache scope holds the key  -> reuse
 *      - otherwise                  -> construct, cache if cacheable
 *   3. Return the root values
 *
 * executeAsync(plan)
 *   Same rules, demand-driven from the roots, awaiting providers.
 *   The first construction of a cached key is recorded in its scope's
 *   in-flight table; concurrent callers share it.
 * ```
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceResolver,
  getDescriptorName,
  getServiceName,
  DIError,
  ProviderFailure,
  ScopeDisposedError,
  UndeclaredDependencyError,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';

import { type ScopePlan, type ScopePlanStep } from './plan-builder';
import { type ScopedContainer } from './scoped-container';

/**
 * Injector - Runs plans against scope caches.
 *
 * @remarks
 * Provider side effects are not sandboxed: a constructor or factory runs
 * exactly when its step is reached. Failures are wrapped in
 * {@link ProviderFailure} with the original error as `cause`; errors the
 * container itself raises pass through unchanged. Nothing is cached for a
 * failed step.
 */
export class Injector {
  constructor(private readonly logger: ILogger) {}

  /**
   * Execute a plan synchronously.
   *
   * @returns The values of `plan.rootSteps`, in order
   * @throws ProviderFailure if a provider throws, returns a promise, or its
   *   key is being constructed asynchronously
   */
  execute(plan: ScopePlan): unknown[] {
    const needed = this.markNeeded(plan);
    const values = new Array<unknown>(plan.steps.length);

    for (const step of plan.steps) {
      if (needed[step.index]) {
        values[step.index] = this.runStep(plan, step, values);
      }
    }

    return plan.rootSteps.map((index) => values[index]);
  }

  /**
   * Execute a plan, awaiting asynchronous providers.
   *
   * @throws ScopeDisposedError if a cache scope started closing meanwhile
   */
  async executeAsync(plan: ScopePlan): Promise<unknown[]> {
    const results = new Map<number, Promise<unknown>>();

    const valueOf = (index: number): Promise<unknown> => {
      let result = results.get(index);
      if (!result) {
        result = this.runStepAsync(stepAt(plan, index), valueOf);
        results.set(index, result);
      }
      return result;
    };

    const roots: unknown[] = [];
    for (const index of plan.rootSteps) {
      roots.push(await valueOf(index));
    }
    return roots;
  }

  // ============================================================================
  // Synchronous Execution
  // ============================================================================

  private markNeeded(plan: ScopePlan): boolean[] {
    const needed = plan.steps.map(() => false);
    for (const index of plan.rootSteps) {
      needed[index] = true;
    }

    // Dependencies precede dependents, so one backward pass suffices
    for (let i = plan.steps.length - 1; i >= 0; i--) {
      const step = stepAt(plan, i);
      if (!needed[i] || this.isSatisfied(step)) {
        continue;
      }
      for (const dep of step.dependencies) {
        needed[dep] = true;
      }
    }

    return needed;
  }

  private isSatisfied(step: ScopePlanStep): boolean {
    const scope = step.cacheScope;
    if (!scope) {
      return false;
    }
    return scope.hasCached(step.serviceIdentifier) || scope.getInFlight(step.serviceIdentifier) !== undefined;
  }

  private runStep(plan: ScopePlan, step: ScopePlanStep, values: readonly unknown[]): unknown {
    const key = step.serviceIdentifier;
    const scope = step.cacheScope;

    if (scope) {
      if (scope.hasCached(key)) {
        return scope.getCached(key);
      }
      if (scope.getInFlight(key)) {
        throw new ProviderFailure(
          key,
          new Error(`'${getServiceName(key)}' is being constructed asynchronously; use resolveAsync()`),
          [...step.path],
        );
      }
    }

    let instance: unknown;
    try {
      instance = this.construct(step, step.dependencies.map((index) => values[index]));
    } catch (error) {
      throw this.wrap(step, error);
    }

    if (isPromiseLike(instance)) {
      this.discard(plan.scope, step, instance);
      throw new ProviderFailure(
        key,
        new Error(`Provider for '${getServiceName(key)}' returned a promise; use resolveAsync()`),
        [...step.path],
      );
    }

    scope?.store(key, instance);
    return instance;
  }

  /**
   * Let a promise returned under synchronous resolution settle quietly.
   */
  private discard(scope: ScopedContainer, step: ScopePlanStep, pending: PromiseLike<unknown>): void {
    void Promise.resolve(pending).then(
      (value) => scope.release(value),
      (error: unknown) => {
        this.logger.warn('Discarded asynchronous provider failed', {
          service: getServiceName(step.serviceIdentifier),
          error,
        });
      },
    );
  }

  // ============================================================================
  // Asynchronous Execution
  // ============================================================================

  private async runStepAsync(
    step: ScopePlanStep,
    valueOf: (index: number) => Promise<unknown>,
  ): Promise<unknown> {
    const key = step.serviceIdentifier;
    const scope = step.cacheScope;

    if (!scope) {
      return this.constructAsync(step, valueOf);
    }

    scope.ensureOpen();
    if (scope.hasCached(key)) {
      return scope.getCached(key);
    }

    const pending = scope.getInFlight(key);
    if (pending) {
      return pending;
    }

    const construction = this.constructShared(step, valueOf, scope);
    scope.trackInFlight(key, construction);
    return construction;
  }

  private async constructShared(
    step: ScopePlanStep,
    valueOf: (index: number) => Promise<unknown>,
    scope: ScopedContainer,
  ): Promise<unknown> {
    const instance = await this.constructAsync(step, valueOf);

    if (scope.state !== 'open') {
      await scope.release(instance);
      throw new ScopeDisposedError(scope.name);
    }

    scope.store(step.serviceIdentifier, instance);
    return instance;
  }

  private async constructAsync(
    step: ScopePlanStep,
    valueOf: (index: number) => Promise<unknown>,
  ): Promise<unknown> {
    const args: unknown[] = [];
    for (const index of step.dependencies) {
      args.push(await valueOf(index));
    }

    try {
      return await this.construct(step, args);
    } catch (error) {
      throw this.wrap(step, error);
    }
  }

  // ============================================================================
  // Construction
  // ============================================================================

  private construct(step: ScopePlanStep, args: unknown[]): unknown {
    const { descriptor } = step;

    if (descriptor.implementationType) {
      return new descriptor.implementationType(...args);
    }

    if (descriptor.factory) {
      return descriptor.factory(this.createResolver(step, args));
    }

    throw new Error(`No factory or implementation type for '${getDescriptorName(descriptor)}'`);
  }

  /**
   * Resolver over a factory's declared dependencies only.
   */
  private createResolver(step: ScopePlanStep, args: readonly unknown[]): IServiceResolver {
    const declared = new Map<ServiceIdentifier, unknown>();
    step.descriptor.dependencies.forEach((dep, i) => declared.set(dep, args[i]));
    const requester = getDescriptorName(step.descriptor);

    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): T => {
        if (!declared.has(identifier)) {
          throw new UndeclaredDependencyError(identifier, requester);
        }
        return declared.get(identifier) as T;
      },
      tryResolve: <T>(identifier: ServiceIdentifier<T>): T | undefined => {
        return declared.has(identifier) ? (declared.get(identifier) as T) : undefined;
      },
    };
  }

  private wrap(step: ScopePlanStep, error: unknown): DIError {
    if (error instanceof DIError) {
      return error;
    }
    return new ProviderFailure(
      step.serviceIdentifier,
      error instanceof Error ? error : new Error(String(error)),
      [...step.path],
    );
  }
}

function stepAt(plan: ScopePlan, index: number): ScopePlanStep {
  const step = plan.steps[index];
  if (!step) {
    throw new RangeError(`Plan has no step #${index}`);
  }
  return step;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}
