/**
 * @fileoverview PlanBuilder - Dependency Graph Validation and Ordering
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Turns requested keys into an {@link IResolutionPlan} without running any
 * provider.
 *
 * ## Algorithm
 *
 * ```
 * buildPlan(roots, scope)
 *   1. Depth-first walk from each root, dependencies in declaration order
 *      - grey node met again        -> CyclicDependencyError
 *      - no binding on scope chain  -> UnboundKeyError
 *      - longer-lived -> shorter    -> ScopeMismatchError (validateScopes)
 *   2. Topological sort of the discovered nodes:
 *      repeatedly emit the ready node (all dependencies emitted) with the
 *      lowest registration order
 *   3. Map edges to step indices
 * ```
 *
 * Graph nodes are `(anchor scope, key)` pairs. The anchor is the scope a
 * key is looked up from: the requesting scope for roots, the owning scope
 * for dependencies of a Singleton, and the dependent's anchor otherwise.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceDescriptor,
  type IPlanStep,
  type IResolutionPlan,
  ServiceLifetime,
  canDependOn,
  createInstanceDescriptor,
  getServiceName,
  CyclicDependencyError,
  ScopeMismatchError,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';

import type { ScopedContainer } from './scoped-container';

/**
 * A plan as the infrastructure layer uses it.
 */
export type ScopePlan = IResolutionPlan<ScopedContainer>;

/**
 * A step as the infrastructure layer uses it.
 */
export type ScopePlanStep = IPlanStep<ScopedContainer>;

/**
 * Options for PlanBuilder.
 */
export interface IPlanBuilderOptions {
  validateScopes: boolean;
  logger: ILogger;
}

/**
 * Graph node under construction.
 * @internal
 */
interface IPlanNode {
  readonly id: number;
  readonly identifier: ServiceIdentifier;
  readonly descriptor: IServiceDescriptor;
  readonly order: number;
  readonly owner: ScopedContainer;
  readonly anchor: ScopedContainer;
  readonly path: readonly string[];
  readonly dependencies: IPlanNode[];
}

/**
 * PlanBuilder - Resolver / graph builder.
 *
 * @remarks
 * Plans depend only on the (sealed) binding layers of the scope chain, so a
 * scope memoises them for its whole lifetime.
 *
 * @example
 * ```typescript
 * const plan = provider.buildPlan(Blt);
 * plan.steps.map((s) => getServiceName(s.serviceIdentifier));
 * // ['Lettuce', 'Bacon', 'Blt']
 * ```
 */
export class PlanBuilder {
  constructor(private readonly options: IPlanBuilderOptions) {}

  /**
   * Validate and order the graph reachable from `roots`.
   *
   * @throws CyclicDependencyError naming every key of the cycle
   * @throws UnboundKeyError with the path that led to the missing key
   * @throws ScopeMismatchError on a captive dependency
   */
  buildPlan(roots: readonly ServiceIdentifier[], scope: ScopedContainer): ScopePlan {
    const nodes: IPlanNode[] = [];
    const byAnchor = new Map<ScopedContainer, Map<ServiceIdentifier, IPlanNode>>();
    // Nodes on the current DFS branch; stack[i] is named by path[i]
    const stack: IPlanNode[] = [];

    const visit = (
      identifier: ServiceIdentifier,
      anchor: ScopedContainer,
      path: string[],
      dependent: IPlanNode | undefined,
    ): IPlanNode => {
      const name = getServiceName(identifier);
      const known = byAnchor.get(anchor)?.get(identifier);

      if (known) {
        const cycleStart = stack.indexOf(known);
        if (cycleStart !== -1) {
          throw new CyclicDependencyError(identifier, path, cycleStart);
        }
        this.checkLifetimes(dependent, known, path);
        return known;
      }

      const node = this.createNode(nodes.length, identifier, anchor, path);
      this.checkLifetimes(dependent, node, path);

      nodes.push(node);
      let anchored = byAnchor.get(anchor);
      if (!anchored) {
        anchored = new Map();
        byAnchor.set(anchor, anchored);
      }
      anchored.set(identifier, node);

      stack.push(node);
      const childAnchor = node.descriptor.lifetime === ServiceLifetime.Singleton ? node.owner : anchor;
      const childPath = [...path, name];
      for (const dep of node.descriptor.dependencies) {
        node.dependencies.push(visit(dep, childAnchor, childPath, node));
      }
      stack.pop();

      return node;
    };

    const rootNodes = roots.map((root) => visit(root, scope, [], undefined));
    const ordered = this.sort(nodes);

    const indexOf = new Map<IPlanNode, number>();
    ordered.forEach((node, index) => indexOf.set(node, index));

    const steps: ScopePlanStep[] = ordered.map((node, index) => ({
      index,
      serviceIdentifier: node.identifier,
      descriptor: node.descriptor,
      owner: node.owner,
      cacheScope: this.cacheScopeOf(node),
      dependencies: node.dependencies.map((dep) => indexOf.get(dep) ?? -1),
      path: node.path,
    }));

    this.options.logger.debug('Plan built', {
      scope: scope.name,
      roots: roots.map(getServiceName),
      steps: steps.map((step) => getServiceName(step.serviceIdentifier)),
    });

    return {
      scope,
      roots,
      rootSteps: rootNodes.map((node) => indexOf.get(node) ?? -1),
      steps,
    };
  }

  /**
   * Look a key up from its anchor; built-in keys come from the anchor itself.
   */
  private createNode(
    id: number,
    identifier: ServiceIdentifier,
    anchor: ScopedContainer,
    path: readonly string[],
  ): IPlanNode {
    const builtin = anchor.getBuiltin(identifier);
    if (builtin !== undefined) {
      return {
        id,
        identifier,
        descriptor: createInstanceDescriptor(identifier, builtin),
        order: -1,
        owner: anchor,
        anchor,
        path,
        dependencies: [],
      };
    }

    const found = anchor.bindings.lookup(identifier, [...path]);
    return {
      id,
      identifier,
      descriptor: found.descriptor,
      order: found.order,
      owner: anchor.ancestor(found.depth),
      anchor,
      path,
      dependencies: [],
    };
  }

  /**
   * Where a node's instance is cached.
   */
  private cacheScopeOf(node: IPlanNode): ScopedContainer | undefined {
    if (node.order === -1) {
      // Built-ins are handed out as-is
      return undefined;
    }

    switch (node.descriptor.lifetime) {
      case ServiceLifetime.Singleton:
        return node.owner;
      case ServiceLifetime.Scoped:
        return node.anchor;
      case ServiceLifetime.Transient:
        return undefined;
    }
  }

  private checkLifetimes(dependent: IPlanNode | undefined, dependency: IPlanNode, path: string[]): void {
    if (!dependent || !this.options.validateScopes || dependency.order === -1) {
      return;
    }

    if (!canDependOn(dependent.descriptor.lifetime, dependency.descriptor.lifetime)) {
      throw new ScopeMismatchError(
        dependent.identifier,
        dependency.identifier,
        dependent.descriptor.lifetime,
        dependency.descriptor.lifetime,
        path,
      );
    }
  }

  /**
   * Kahn's algorithm; among ready nodes the lowest registration order wins,
   * then discovery order.
   */
  private sort(nodes: readonly IPlanNode[]): IPlanNode[] {
    const remaining = new Map<IPlanNode, number>();
    const dependents = new Map<IPlanNode, IPlanNode[]>();

    for (const node of nodes) {
      const unique = new Set(node.dependencies);
      remaining.set(node, unique.size);
      for (const dep of unique) {
        const list = dependents.get(dep);
        if (list) {
          list.push(node);
        } else {
          dependents.set(dep, [node]);
        }
      }
    }

    const ready = nodes.filter((node) => remaining.get(node) === 0);
    const ordered: IPlanNode[] = [];

    while (ready.length > 0) {
      ready.sort(compareNodes);
      const next = ready.shift();
      if (!next) {
        break;
      }
      ordered.push(next);

      for (const dependent of dependents.get(next) ?? []) {
        const left = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, left);
        if (left === 0) {
          ready.push(dependent);
        }
      }
    }

    return ordered;
  }
}

function compareNodes(a: IPlanNode, b: IPlanNode): number {
  return a.order - b.order || a.id - b.id;
}
