/**
 * @fileoverview ScopeManager - Opening and Closing Scopes
 *
 * @packageDocumentation
 * @module @graphward/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Close Sequence
 *
 * ```
 * closeScope(scope)
 *   1. not open          -> AlreadyClosedError (nothing changes)
 *   2. open children     -> ScopeOrderError    (scope stays open)
 *   3. state = closing   (new resolutions fail with ScopeDisposedError)
 *   4. await in-flight constructions
 *   5. release disposables, newest first (failures are logged)
 *   6. clear cache and plans, detach from parent, state = closed
 * ```
 *
 * @version 1.0.0
 */

import {
  type IScopeOptions,
  AlreadyClosedError,
  ScopeOrderError,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';

import { BindingRegistry } from './binding-registry';
import { ScopedContainer } from './scoped-container';
import { ServiceRegistrar } from './service-registrar';
import type { ServiceProvider } from './service-provider';

/**
 * Options for ScopeManager.
 */
export interface IScopeManagerOptions {
  /**
   * Conflict policy of the binding layers it creates.
   */
  allowOverride: boolean;
  logger: ILogger;
}

/**
 * ScopeManager - Owns scope ids and the open/close protocol.
 */
export class ScopeManager {
  private nextId = 0;

  constructor(private readonly options: IScopeManagerOptions) {}

  /**
   * Create the root scope over an already sealed layer.
   */
  createRoot(provider: ServiceProvider, bindings: BindingRegistry): ScopedContainer {
    const scope = new ScopedContainer(provider, this.nextId++, bindings.label, bindings);
    this.options.logger.debug('Scope opened', { scope: scope.name });
    return scope;
  }

  /**
   * Open a child scope.
   *
   * @throws ScopeDisposedError if the parent is not open or is being disposed
   */
  openScope(provider: ServiceProvider, parent: ScopedContainer, options: IScopeOptions = {}): ScopedContainer {
    parent.ensureAcceptsChildren();

    const id = this.nextId++;
    const name = options.name ?? `scope-${id}`;
    const bindings = new BindingRegistry(name, parent.bindings, {
      allowOverride: this.options.allowOverride,
    });

    options.configure?.(new ServiceRegistrar(bindings));
    bindings.seal();

    const scope = new ScopedContainer(provider, id, name, bindings, parent);
    parent.adopt(scope);

    this.options.logger.debug('Scope opened', { scope: name, parent: parent.name });
    return scope;
  }

  /**
   * Close a scope and release what it cached.
   *
   * @throws AlreadyClosedError if the scope is closing or closed
   * @throws ScopeOrderError if it still has open children
   */
  async closeScope(scope: ScopedContainer): Promise<void> {
    if (scope.state !== 'open' || scope.pendingClose) {
      throw new AlreadyClosedError(scope.name);
    }

    const open = scope.children;
    if (open.length > 0) {
      throw new ScopeOrderError(
        scope.name,
        open.map((child) => child.name),
      );
    }

    scope.beginClose();
    const closing = this.runClose(scope);
    scope.trackClose(closing);
    await closing;
  }

  /**
   * Close a scope and every open descendant, innermost first.
   *
   * @remarks
   * Never reports order or double-close errors. If a close is already under
   * way, waits for it. No child can be opened under the scope once this
   * starts.
   */
  async disposeTree(scope: ScopedContainer): Promise<void> {
    const pending = scope.pendingClose;
    if (pending) {
      await pending;
      return;
    }
    if (scope.state !== 'open') {
      return;
    }

    const disposing = Promise.resolve().then(() => this.drainAndClose(scope));
    scope.trackClose(disposing);
    await disposing;
  }

  private async drainAndClose(scope: ScopedContainer): Promise<void> {
    let newest = scope.children.at(-1);
    while (newest) {
      await this.disposeTree(newest);
      newest = scope.children.at(-1);
    }

    scope.beginClose();
    await this.runClose(scope);
  }

  private async runClose(scope: ScopedContainer): Promise<void> {
    await scope.settleInFlight();

    const disposables = scope.takeDisposables();
    for (const instance of disposables) {
      await scope.release(instance);
    }

    scope.finishClose();
    this.options.logger.debug('Scope closed', {
      scope: scope.name,
      released: disposables.length,
    });
  }
}
