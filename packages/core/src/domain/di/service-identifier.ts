/**
 * @fileoverview ServiceIdentifier - Binding Keys
 *
 * @packageDocumentation
 * @module @graphward/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A binding key identifies a requested capability. Three forms are accepted:
 *
 * 1. **Constructor**: the class is its own key
 *    ```typescript
 *    services.addScoped(Lettuce);
 *    ```
 *
 * 2. **Symbol**: a typed token standing for an interface
 *    ```typescript
 *    const ISauce = createToken<ISauce>('ISauce');
 *    services.addScoped(ISauce, Mayonnaise);
 *    ```
 *
 * 3. **String**: configuration-driven keys
 *    ```typescript
 *    services.addSingletonInstance('kitchen.name', 'Corner Deli');
 *    ```
 *
 * A key plus a qualifier ("interface + qualifier") is itself a key, produced
 * by {@link qualify}.
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * ServiceIdentifier - Unified type for binding keys.
 *
 * @template T - The service instance type
 *
 * @remarks
 * Registries key their maps on the identifier value itself, so two classes
 * that share a name never collide, and a symbol is only ever equal to itself.
 *
 * @example Using a token
 * ```typescript
 * interface IBread { slices(): number; }
 * const IBread = createToken<IBread>('IBread');
 *
 * services.addScoped(IBread, Sourdough);
 * const bread = scope.resolve(IBread); // typed as IBread
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceIdentifier<T = any> = Constructor<T> | symbol | string;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(Lettuce); // true (constructor)
 * isServiceIdentifier(Symbol('IBread')); // true (symbol)
 * isServiceIdentifier('kitchen.name'); // true (string)
 * isServiceIdentifier(42); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  const type = typeof value;
  return type === 'symbol' || type === 'string' || type === 'function';
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used in error messages, resolution paths and log lines.
 *
 * @example
 * ```typescript
 * getServiceName(Lettuce); // 'Lettuce'
 * getServiceName(Symbol('IBread')); // 'Symbol(IBread)'
 * getServiceName('kitchen.name'); // 'kitchen.name'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }

  if (typeof identifier === 'string') {
    return identifier;
  }

  return identifier.name || 'AnonymousClass';
}

// ============================================================================
// Qualified Keys
// ============================================================================

/**
 * Interned qualified keys: base identifier -> qualifier -> key.
 *
 * @remarks
 * Class bases are held weakly. Token and string bases stay for the life of
 * the process. The table maps keys to keys and holds no bindings or
 * instances.
 * @internal
 */
const qualifiedByClass = new WeakMap<Constructor, Map<string, symbol>>();
const qualifiedByToken = new Map<symbol | string, Map<string, symbol>>();

/**
 * Derive a qualified key from a base identifier.
 *
 * @remarks
 * The same `(identifier, qualifier)` pair always returns the same symbol,
 * so qualified keys can be written inline at both registration and
 * injection sites:
 *
 * ```typescript
 * services
 *   .addScoped(qualify(IBread, 'toasted'), ToastedRye)
 *   .addScoped(qualify(IBread, 'plain'), Sourdough);
 *
 * class Club {
 *   static inject = [qualify(IBread, 'toasted')] as const;
 *   constructor(readonly bread: IBread) {}
 * }
 * ```
 */
export function qualify<T>(identifier: ServiceIdentifier<T>, qualifier: string): ServiceIdentifier<T> {
  const byQualifier = qualifiersOf(identifier);

  let key = byQualifier.get(qualifier);
  if (!key) {
    key = Symbol(`${describeBase(identifier)}@${qualifier}`);
    byQualifier.set(qualifier, key);
  }

  return key;
}

function qualifiersOf(identifier: ServiceIdentifier): Map<string, symbol> {
  if (typeof identifier === 'function') {
    let byQualifier = qualifiedByClass.get(identifier);
    if (!byQualifier) {
      byQualifier = new Map();
      qualifiedByClass.set(identifier, byQualifier);
    }
    return byQualifier;
  }

  let byQualifier = qualifiedByToken.get(identifier);
  if (!byQualifier) {
    byQualifier = new Map();
    qualifiedByToken.set(identifier, byQualifier);
  }
  return byQualifier;
}

function describeBase(identifier: ServiceIdentifier): string {
  return typeof identifier === 'symbol' ? (identifier.description ?? 'symbol') : getServiceName(identifier);
}

// ============================================================================
// Injectable Constructors (Static Inject Pattern)
// ============================================================================

/**
 * Type for a constructor with a static inject property.
 *
 * @remarks
 * Dependencies are declared on the class, in constructor parameter order.
 * Nothing is read from type metadata:
 *
 * ```typescript
 * class Blt {
 *   static inject = [Lettuce, Bacon] as const;
 *   constructor(readonly lettuce: Lettuce, readonly bacon: Bacon) {}
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export interface IInjectableConstructor<T = any> extends Constructor<T> {
  /**
   * Static array of dependency identifiers.
   * Order must match constructor parameter order.
   */
  inject?: readonly ServiceIdentifier[];
}

/**
 * Check if a constructor has static inject property.
 */
export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Get dependencies from a constructor's static inject property.
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

/**
 * Get the dependencies declared by the class of a host-constructed object.
 */
export function getAttachDependencies(target: object): readonly ServiceIdentifier[] {
  const ctor: unknown = target.constructor;
  if (typeof ctor === 'function' && 'inject' in ctor && Array.isArray(ctor.inject)) {
    return ctor.inject;
  }
  return [];
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token (Symbol) for interface abstraction.
 *
 * @template T - The interface type this token represents
 * @param description - Description for debugging
 *
 * @example
 * ```typescript
 * interface ICheese { melt(): void; }
 * const ICheese = createToken<ICheese>('ICheese');
 *
 * services.addScoped(ICheese, Cheddar);
 * const cheese = scope.resolve(ICheese); // ICheese
 * ```
 */
export function createToken<T>(description: string): ServiceIdentifier<T> {
  return Symbol(description);
}

// ============================================================================
// Pre-defined Core Tokens
// ============================================================================

/**
 * Token for the service provider itself.
 *
 * @remarks
 * Inject it into services that open scopes of their own:
 *
 * ```typescript
 * class OrderDesk {
 *   static inject = [SERVICE_PROVIDER_TOKEN] as const;
 *   constructor(private readonly provider: IServiceProvider) {}
 * }
 * ```
 */
export const SERVICE_PROVIDER_TOKEN = Symbol('IServiceProvider');

/**
 * Token for the scope a service is being resolved in.
 */
export const SERVICE_SCOPE_TOKEN = Symbol('IServiceScope');
