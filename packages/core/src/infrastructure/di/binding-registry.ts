/**
 * @fileoverview BindingRegistry - Layered Registration Table
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every scope owns one layer of bindings. A layer points at its parent's
 * layer, so lookups walk outward until a binding is found:
 *
 * ```
 * order-7    [ ISauce -> Aioli ]
 *    │
 * session-42 [ Cart ]
 *    │
 * root       [ IOven, Lettuce, Bacon, Blt, ISauce -> Mayonnaise ]
 *
 * lookup(ISauce) from order-7   -> Aioli       (depth 0)
 * lookup(Lettuce) from order-7  -> Lettuce     (depth 2)
 * ```
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceDescriptor,
  ConflictError,
  ContainerSealedError,
  UnboundKeyError,
} from '../../domain/di';

/**
 * A descriptor plus its position in registration order.
 */
export interface IBinding {
  readonly descriptor: IServiceDescriptor;

  /**
   * Registration order, comparable across every layer of one tree.
   */
  readonly order: number;
}

/**
 * Result of walking the layer chain.
 */
export interface IBindingLookup extends IBinding {
  /**
   * How many parents were walked: 0 means the layer that was asked.
   */
  readonly depth: number;
}

/**
 * Options for a registry layer.
 */
export interface IBindingRegistryOptions {
  /**
   * Let a later registration replace an earlier one (last wins).
   */
  allowOverride?: boolean;
}

/**
 * BindingRegistry - One layer of key -> binding.
 *
 * @remarks
 * **Invariants:**
 *
 * - At most one binding per key in a layer
 * - Immutable once sealed; reads need no coordination after that
 * - `order` grows monotonically across the whole tree, so ties between
 *   layers are broken the same way every time
 */
export class BindingRegistry {
  private readonly bindings = new Map<ServiceIdentifier, IBinding>();

  private readonly counter: { next: number };

  private readonly allowOverride: boolean;

  private sealed = false;

  constructor(
    readonly label: string,
    readonly parent?: BindingRegistry,
    options?: IBindingRegistryOptions,
  ) {
    this.counter = parent?.counter ?? { next: 0 };
    this.allowOverride = options?.allowOverride ?? false;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Add a binding to this layer.
   *
   * @throws ContainerSealedError once sealed
   * @throws ConflictError if the key is already bound here and overrides are off
   */
  register(descriptor: IServiceDescriptor): IBinding {
    this.ensureNotSealed();

    const key = descriptor.serviceIdentifier;
    if (this.bindings.has(key) && !this.allowOverride) {
      throw new ConflictError(key, this.label);
    }

    const binding: IBinding = { descriptor, order: this.counter.next++ };
    this.bindings.set(key, binding);
    return binding;
  }

  /**
   * Remove a binding from this layer.
   */
  remove(identifier: ServiceIdentifier): boolean {
    this.ensureNotSealed();
    return this.bindings.delete(identifier);
  }

  /**
   * Remove every binding of this layer.
   */
  clear(): void {
    this.ensureNotSealed();
    this.bindings.clear();
  }

  /**
   * Make the layer read-only.
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  /**
   * Binding for a key in this layer only.
   */
  get(identifier: ServiceIdentifier): IBinding | undefined {
    return this.bindings.get(identifier);
  }

  /**
   * Check this layer only.
   */
  has(identifier: ServiceIdentifier): boolean {
    return this.bindings.has(identifier);
  }

  /**
   * Nearest binding for a key, walking from this layer through its parents.
   */
  find(identifier: ServiceIdentifier): IBindingLookup | undefined {
    let layer: BindingRegistry | undefined = this;
    let depth = 0;

    while (layer) {
      const binding = layer.bindings.get(identifier);
      if (binding) {
        return { ...binding, depth };
      }
      layer = layer.parent;
      depth++;
    }

    return undefined;
  }

  /**
   * Nearest binding for a key.
   *
   * @param resolutionPath - Path reported if the key is unbound
   * @throws UnboundKeyError if no layer binds the key
   */
  lookup(identifier: ServiceIdentifier, resolutionPath: string[] = []): IBindingLookup {
    const found = this.find(identifier);
    if (!found) {
      throw new UnboundKeyError(identifier, resolutionPath);
    }
    return found;
  }

  /**
   * This layer's bindings in registration order.
   */
  list(): IBinding[] {
    return Array.from(this.bindings.values()).sort((a, b) => a.order - b.order);
  }

  /**
   * Every binding visible from this layer (nearest wins), in registration order.
   */
  visible(): IBindingLookup[] {
    const seen = new Map<ServiceIdentifier, IBindingLookup>();
    let layer: BindingRegistry | undefined = this;
    let depth = 0;

    while (layer) {
      for (const [key, binding] of layer.bindings) {
        if (!seen.has(key)) {
          seen.set(key, { ...binding, depth });
        }
      }
      layer = layer.parent;
      depth++;
    }

    return Array.from(seen.values()).sort((a, b) => a.order - b.order);
  }

  private ensureNotSealed(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
  }
}
