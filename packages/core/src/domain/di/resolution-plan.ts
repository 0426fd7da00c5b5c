/**
 * @fileoverview IResolutionPlan - Ordered Construction Steps
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A plan is the validated dependency graph of one or more root keys,
 * flattened into construction order:
 *
 * ```
 * buildPlan(Blt)
 *   #0 Lettuce   (Scoped,    scope 'order-1')
 *   #1 Bacon     (Scoped,    scope 'order-1')
 *   #2 Blt       (Transient) <- #0, #1
 * ```
 *
 * Every dependency appears before its dependents, so executing the steps
 * front to back never meets an unresolved argument.
 *
 * @version 1.0.0
 */

import { type IServiceDescriptor } from './service-descriptor';
import { type ServiceIdentifier } from './service-identifier';

/**
 * One node of the dependency graph.
 *
 * @template TScope - Scope handle type
 */
export interface IPlanStep<TScope = unknown> {
  /**
   * Position of this step in `IResolutionPlan.steps`.
   */
  readonly index: number;

  /**
   * Key this step produces.
   */
  readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The binding found for the key.
   */
  readonly descriptor: IServiceDescriptor;

  /**
   * Scope whose binding layer holds `descriptor`.
   */
  readonly owner: TScope;

  /**
   * Scope whose cache keeps the instance; `undefined` for transient steps.
   */
  readonly cacheScope: TScope | undefined;

  /**
   * Indices of the steps producing this step's arguments, in argument order.
   */
  readonly dependencies: readonly number[];

  /**
   * Names of the keys leading from a root to this step (exclusive).
   */
  readonly path: readonly string[];
}

/**
 * A validated, topologically ordered construction plan.
 *
 * @template TScope - Scope handle type
 */
export interface IResolutionPlan<TScope = unknown> {
  /**
   * Scope the plan was built against.
   */
  readonly scope: TScope;

  /**
   * Requested keys, in request order.
   */
  readonly roots: readonly ServiceIdentifier[];

  /**
   * Indices of the root steps, parallel to `roots`.
   */
  readonly rootSteps: readonly number[];

  /**
   * Steps in construction order.
   */
  readonly steps: readonly IPlanStep<TScope>[];
}
