/**
 * @fileoverview DI Errors - Dependency Injection Error Classes
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Error classes for configuration, planning, construction and scope
 * lifecycle failures. Each carries the resolution path that led to it.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';
import { type ServiceLifetime, getLifetimeName } from './service-lifetime';

/**
 * Base error class for all DI-related errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   scope.resolve(Blt);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     logger.error(error.message, { path: error.resolutionPath });
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * The chain of keys being resolved when the error occurred:
   * ```
   * Blt -> Bacon -> ISmoker (UNBOUND)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * The resolution path rendered as an indented tree:
   * ```
   * Blt
   *   └─ Bacon
   *     └─ ISmoker (UNBOUND)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = renderPath(resolutionPath);

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function renderPath(path: readonly string[]): string {
  return path
    .map((entry, i) => `${'  '.repeat(i)}${i === 0 ? '' : '└─ '}${entry}`)
    .join('\n');
}

// ============================================================================
// Registry Errors
// ============================================================================

/**
 * No binding exists for a key anywhere on the scope chain.
 *
 * @example
 * ```typescript
 * // Blt needs Bacon, which was never registered
 * scope.resolve(Blt); // UnboundKeyError: Service 'Bacon' is not bound ...
 *
 * // Fix:
 * services.addScoped(Bacon);
 * ```
 */
export class UnboundKeyError extends DIError {
  /**
   * The key that was not found.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);
    const requiredBy = resolutionPath[resolutionPath.length - 1];
    const message =
      `Service '${name}' is not bound in this scope or any of its parents` +
      (requiredBy !== undefined ? ` (required by '${requiredBy}')` : '') +
      `. Did you forget to call services.add*(${name})?`;

    super(message, [...resolutionPath, `${name} (UNBOUND)`]);
    this.serviceIdentifier = identifier;
  }
}

/**
 * A key was registered twice at the same registry level.
 *
 * @remarks
 * Build the collection with `{ allowOverride: true }` to make the last
 * registration win instead.
 */
export class ConflictError extends DIError {
  /**
   * The key registered twice.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, level: string) {
    const name = getServiceName(identifier);
    super(
      `Service '${name}' is already bound in ${level}. ` +
        `Remove the earlier registration or enable allowOverride.`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Registration attempted after the registry was sealed.
 */
export class ContainerSealedError extends DIError {
  constructor() {
    super(
      'Cannot register services after the registry has been sealed. ' +
        'Register all services before calling build() or before openScope() returns.',
    );
  }
}

// ============================================================================
// Planning Errors
// ============================================================================

/**
 * The dependency graph contains a cycle.
 *
 * @remarks
 * Raised while the plan is built, so no provider has run yet.
 *
 * ```
 * Chicken -> Egg -> Chicken  ← CYCLE
 * ```
 *
 * **Solutions:**
 * 1. Extract the shared part into a third service
 * 2. Inject a scope handle and resolve lazily at call time
 */
export class CyclicDependencyError extends DIError {
  /**
   * The key that closed the cycle.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * Every key of the cycle, first key repeated at the end.
   */
  public readonly cyclePath: string[];

  /**
   * @param cycleStart - Index in `resolutionPath` of the first visit of
   *   `identifier`. Names are not unique, so the planner passes it in.
   */
  constructor(identifier: ServiceIdentifier, resolutionPath: string[], cycleStart: number) {
    const name = getServiceName(identifier);
    const cyclePath = [...resolutionPath.slice(Math.max(cycleStart, 0)), name];

    const message =
      `Circular dependency detected: ${cyclePath.join(' -> ')}\n\n` +
      `Resolution chain:\n${[...resolutionPath, name]
        .map((s, i) => `  ${' '.repeat(i * 2)}${i + 1}. ${s}`)
        .join('\n')}\n\nTo fix:\n` +
      `  1. Refactor to break the cycle\n` +
      `  2. Inject SERVICE_SCOPE_TOKEN and resolve lazily\n` +
      `  3. Extract shared logic into a separate service`;

    super(message, [...resolutionPath, `${name} (CIRCULAR!)`]);
    this.serviceIdentifier = identifier;
    this.cyclePath = cyclePath;
  }
}

/**
 * A longer-lived binding depends on a shorter-lived one.
 *
 * @remarks
 * **Invalid Dependencies:**
 * - ❌ Singleton → Scoped
 * - ❌ Singleton → Transient
 * - ❌ Scoped → Transient
 *
 * The longer-lived instance would keep the shorter-lived one alive past its
 * scope (a "captive dependency").
 */
export class ScopeMismatchError extends DIError {
  public readonly dependentIdentifier: ServiceIdentifier;
  public readonly dependencyIdentifier: ServiceIdentifier;
  public readonly dependentLifetime: ServiceLifetime;
  public readonly dependencyLifetime: ServiceLifetime;

  constructor(
    dependentId: ServiceIdentifier,
    dependencyId: ServiceIdentifier,
    dependentLifetime: ServiceLifetime,
    dependencyLifetime: ServiceLifetime,
    resolutionPath: string[] = [],
  ) {
    const dependentName = getServiceName(dependentId);
    const dependencyName = getServiceName(dependencyId);
    const dependentLifetimeName = getLifetimeName(dependentLifetime);
    const dependencyLifetimeName = getLifetimeName(dependencyLifetime);

    const message =
      `Scope mismatch: ${dependentLifetimeName} service '${dependentName}' ` +
      `cannot depend on ${dependencyLifetimeName} service '${dependencyName}'.\n\n` +
      `To fix:\n` +
      `  1. Change '${dependencyName}' to ${dependentLifetimeName}\n` +
      `  2. Inject SERVICE_SCOPE_TOKEN and resolve '${dependencyName}' when needed\n` +
      `  3. Change '${dependentName}' to ${dependencyLifetimeName}`;

    super(message, [
      ...resolutionPath,
      `${dependencyName} (${dependencyLifetimeName}) ← SCOPE MISMATCH`,
    ]);

    this.dependentIdentifier = dependentId;
    this.dependencyIdentifier = dependencyId;
    this.dependentLifetime = dependentLifetime;
    this.dependencyLifetime = dependencyLifetime;
  }
}

/**
 * A factory asked its resolver for a key missing from its `inject` list.
 */
export class UndeclaredDependencyError extends DIError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, requester: string) {
    const name = getServiceName(identifier);
    super(
      `Factory for '${requester}' asked for '${name}', which is not in its inject list. ` +
        `Declare it: { inject: [..., ${name}] }`,
      [requester, `${name} (UNDECLARED)`],
    );
    this.serviceIdentifier = identifier;
  }
}

// ============================================================================
// Construction Errors
// ============================================================================

/**
 * A provider failed while constructing an instance.
 *
 * @remarks
 * Wraps whatever the constructor or factory threw; the original error is
 * kept as `cause`. Nothing is cached for the failed key, so a later
 * resolve retries the construction.
 */
export class ProviderFailure extends DIError {
  /**
   * The key whose provider failed.
   */
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The original error raised by the provider.
   */
  public readonly cause: Error;

  constructor(identifier: ServiceIdentifier, cause: Error, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(`Failed to create service '${name}': ${cause.message}`, [
      ...resolutionPath,
      `${name} (CREATION FAILED)`,
    ]);
    this.serviceIdentifier = identifier;
    this.cause = cause;
  }
}

// ============================================================================
// Scope Lifecycle Errors
// ============================================================================

/**
 * Resolution or scope creation attempted on a closed scope.
 */
export class ScopeDisposedError extends DIError {
  /**
   * Name of the closed scope.
   */
  public readonly scopeName: string;

  constructor(scopeName: string) {
    super(
      `Scope '${scopeName}' has been closed. ` +
        'Open a new scope with provider.openScope() and resolve from that.',
    );
    this.scopeName = scopeName;
  }
}

/**
 * A scope was closed while some of its children were still open.
 *
 * @remarks
 * Scopes close innermost first:
 *
 * ```typescript
 * const order = provider.openScope(session);
 * await provider.closeScope(session); // ❌ ScopeOrderError
 * await provider.closeScope(order);
 * await provider.closeScope(session); // ✅
 * ```
 */
export class ScopeOrderError extends DIError {
  /**
   * Name of the scope that was asked to close.
   */
  public readonly scopeName: string;

  /**
   * Names of the children still open.
   */
  public readonly openChildren: string[];

  constructor(scopeName: string, openChildren: string[]) {
    super(
      `Cannot close scope '${scopeName}' while child scope(s) are open: ` +
        `${openChildren.join(', ')}. Close children before their parent.`,
    );
    this.scopeName = scopeName;
    this.openChildren = openChildren;
  }
}

/**
 * A scope was closed a second time.
 *
 * @remarks
 * The second close changes nothing; the error only reports it.
 */
export class AlreadyClosedError extends DIError {
  /**
   * Name of the scope.
   */
  public readonly scopeName: string;

  constructor(scopeName: string) {
    super(`Scope '${scopeName}' is already closed.`);
    this.scopeName = scopeName;
  }
}
