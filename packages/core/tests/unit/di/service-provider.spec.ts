/**
 * @fileoverview ServiceProvider Unit Tests
 *
 * Tests for the dependency resolution engine.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  createToken,
  UnboundKeyError,
  CyclicDependencyError,
  ScopeMismatchError,
  ScopeDisposedError,
  ProviderFailure,
  UndeclaredDependencyError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
  type IDisposable,
  type IServiceScope,
  type IServiceScopeFactory,
} from '../../../src/domain/di';
import { ServiceCollection, type ServiceProvider } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

// Interface tokens
const IOven = createToken<IOvenInterface>('IOven');
const IFryer = createToken<IFryerInterface>('IFryer');
const IConfig = createToken<IConfigInterface>('IConfig');

interface IOvenInterface {
  bake(bread: string): string;
}

interface IFryerInterface {
  fry(item: string): Promise<string>;
}

interface IConfigInterface {
  fryerTemp: number;
  station: string;
}

// Concrete implementations
class GasOven implements IOvenInterface {
  bake(bread: string): string {
    return `baked ${bread}`;
  }
}

class DeepFryer implements IFryerInterface {
  async fry(item: string): Promise<string> {
    return `fried ${item}`;
  }
}

class KitchenConfig implements IConfigInterface {
  fryerTemp = 180;
  station = 'grill-1';
}

// Service with dependencies
class LineCook {
  static inject = [IOven, IFryer] as const;

  constructor(
    public readonly oven: IOvenInterface,
    public readonly fryer: IFryerInterface,
  ) {}
}

// Service with nested dependencies
class HeadChef {
  static inject = [LineCook, IOven] as const;

  constructor(
    public readonly cook: LineCook,
    public readonly oven: IOvenInterface,
  ) {}
}

// Disposable service
class DisposableFryer implements IDisposable {
  disposed = false;

  dispose(): void {
    this.disposed = true;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('ServiceProvider', () => {
  let services: ServiceCollection;
  let provider: ServiceProvider;

  beforeEach(() => {
    services = new ServiceCollection();
  });

  // ============================================================================
  // Basic Resolution Tests
  // ============================================================================

  describe('resolve - basic', () => {
    it('should resolve singleton service', () => {
      services.addSingleton(KitchenConfig);
      provider = services.build();

      const config = provider.resolve(KitchenConfig);

      expect(config).toBeInstanceOf(KitchenConfig);
      expect(config.fryerTemp).toBe(180);
    });

    it('should resolve interface-to-implementation', () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      expect(provider.resolve(IOven)).toBeInstanceOf(GasOven);
    });

    it('should resolve factory-based service', () => {
      services.addSingletonFactory(IConfig, () => ({
        fryerTemp: 200,
        station: 'fry-2',
      }));
      provider = services.build();

      const config = provider.resolve(IConfig);

      expect(config.fryerTemp).toBe(200);
      expect(config.station).toBe('fry-2');
    });

    it('should resolve instance registration', () => {
      const instance = new KitchenConfig();
      instance.fryerTemp = 190;

      services.addSingletonInstance(KitchenConfig, instance);
      provider = services.build();

      expect(provider.resolve(KitchenConfig)).toBe(instance);
    });
  });

  // ============================================================================
  // Dependency Injection Tests
  // ============================================================================

  describe('resolve - dependencies', () => {
    it('should inject dependencies from static inject', () => {
      services
        .addSingleton(IOven, GasOven)
        .addSingleton(IFryer, DeepFryer)
        .addSingleton(LineCook);

      provider = services.build();

      const cook = provider.resolve(LineCook);

      expect(cook).toBeInstanceOf(LineCook);
      expect(cook.oven).toBeInstanceOf(GasOven);
      expect(cook.fryer).toBeInstanceOf(DeepFryer);
    });

    it('should inject nested dependencies', () => {
      services
        .addSingleton(IOven, GasOven)
        .addSingleton(IFryer, DeepFryer)
        .addSingleton(LineCook)
        .addSingleton(HeadChef);

      provider = services.build();

      const chef = provider.resolve(HeadChef);

      expect(chef.cook).toBeInstanceOf(LineCook);
      expect(chef.oven).toBe(chef.cook.oven);
    });

    it('should hand declared dependencies to factories', () => {
      services
        .addSingleton(IConfig, KitchenConfig)
        .addSingletonFactory(
          IOven,
          (resolver) => {
            const config = resolver.resolve(IConfig);
            return { bake: (bread: string) => `${bread} at ${config.fryerTemp}` };
          },
          { inject: [IConfig] },
        );

      provider = services.build();

      expect(provider.resolve(IOven).bake('rye')).toBe('rye at 180');
    });

    it('should reject a factory reading an undeclared dependency', () => {
      services.addSingleton(IConfig, KitchenConfig).addSingletonFactory(IOven, (resolver) => {
        resolver.resolve(IConfig);
        return new GasOven();
      });

      provider = services.build();

      expect(() => provider.resolve(IOven)).toThrow(UndeclaredDependencyError);
    });

    it('should return undefined from tryResolve for an undeclared dependency', () => {
      services.addSingleton(IConfig, KitchenConfig).addSingletonFactory(IOven, (resolver) => {
        return resolver.tryResolve(IConfig) === undefined ? new GasOven() : { bake: () => 'configured' };
      });

      provider = services.build();

      expect(provider.resolve(IOven)).toBeInstanceOf(GasOven);
    });
  });

  // ============================================================================
  // Lifetime Tests
  // ============================================================================

  describe('singleton caching', () => {
    it('should return same instance for singleton', () => {
      services.addSingleton(KitchenConfig);
      provider = services.build();

      expect(provider.resolve(KitchenConfig)).toBe(provider.resolve(KitchenConfig));
    });

    it('should share a root singleton with every scope', () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      const rootOven = provider.resolve(IOven);
      const scope = provider.createScope();

      expect(scope.resolve(IOven)).toBe(rootOven);
    });

    it('should cache a root singleton first resolved from a scope in the root', async () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      const scope = provider.createScope();
      const oven = scope.resolve(IOven);
      await provider.closeScope(scope);

      expect(provider.resolve(IOven)).toBe(oven);
    });

    it('should cache a child-bound singleton in the child only', () => {
      provider = services.build();

      const first = provider.createScope({ configure: (child) => child.addSingleton(IOven, GasOven) });
      const second = provider.createScope({ configure: (child) => child.addSingleton(IOven, GasOven) });

      expect(first.resolve(IOven)).toBe(first.resolve(IOven));
      expect(first.resolve(IOven)).not.toBe(second.resolve(IOven));
    });
  });

  describe('transient resolution', () => {
    it('should create new instance each time', () => {
      services.addTransient(KitchenConfig);
      provider = services.build();

      expect(provider.resolve(KitchenConfig)).not.toBe(provider.resolve(KitchenConfig));
    });

    it('should share one transient within a single resolve call', () => {
      class Napkin {}
      class Tray {
        static inject = [Napkin, Napkin] as const;
        constructor(
          readonly left: Napkin,
          readonly right: Napkin,
        ) {}
      }

      services.addTransient(Napkin).addTransient(Tray);
      provider = services.build();

      const tray = provider.resolve(Tray);
      const other = provider.resolve(Tray);

      expect(tray.left).toBe(tray.right);
      expect(other.left).not.toBe(tray.left);
    });
  });

  describe('scoped resolution', () => {
    beforeEach(() => {
      services
        .addSingleton(IOven, GasOven)
        .addScoped(IFryer, DeepFryer)
        .addScoped(LineCook);

      provider = services.build();
    });

    it('should cache scoped service within scope', () => {
      const scope = provider.createScope();

      expect(scope.resolve(IFryer)).toBe(scope.resolve(IFryer));
    });

    it('should create different instances in sibling scopes', () => {
      const first = provider.createScope();
      const second = provider.createScope();

      expect(first.resolve(IFryer)).not.toBe(second.resolve(IFryer));
    });

    it('should cache per resolving scope, not per parent', () => {
      const parent = provider.createScope({ name: 'session' });
      const child = parent.createScope({ name: 'order' });

      expect(child.resolve(IFryer)).not.toBe(parent.resolve(IFryer));
    });

    it('should inject scoped into scoped from the same cache', () => {
      const scope = provider.createScope();

      const cook = scope.resolve(LineCook);

      expect(cook.fryer).toBe(scope.resolve(IFryer));
      expect(cook.oven).toBe(provider.resolve(IOven));
    });

    it('should cache scoped services resolved from the provider in the root scope', () => {
      expect(provider.resolve(IFryer)).toBe(provider.rootScope.resolve(IFryer));
    });
  });

  // ============================================================================
  // Error Handling Tests
  // ============================================================================

  describe('error handling', () => {
    it('should throw UnboundKeyError for unregistered service', () => {
      provider = services.build();

      expect(() => provider.resolve(IOven)).toThrow(UnboundKeyError);
    });

    it('should include resolution path in error', () => {
      services.addSingleton(LineCook); // Missing IOven and IFryer

      provider = services.build();

      try {
        provider.resolve(LineCook);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(UnboundKeyError);
        const unbound = error as UnboundKeyError;
        expect(unbound.serviceIdentifier).toBe(IOven);
        expect(unbound.resolutionPath).toEqual(['LineCook', 'Symbol(IOven) (UNBOUND)']);
        expect(unbound.message).toContain("(required by 'LineCook')");
      }
    });

    it('should wrap a throwing constructor in ProviderFailure', () => {
      const cause = new Error('grease fire');
      class Exploding {
        constructor() {
          throw cause;
        }
      }

      services.addScoped(Exploding);
      provider = services.build();

      try {
        provider.resolve(Exploding);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ProviderFailure);
        const failure = error as ProviderFailure;
        expect(failure.cause).toBe(cause);
        expect(failure.message).toBe("Failed to create service 'Exploding': grease fire");
      }
    });

    it('should not cache a failed construction', () => {
      let attempts = 0;
      services.addSingletonFactory(IConfig, () => {
        attempts++;
        if (attempts === 1) {
          throw new Error('walk-in cooler offline');
        }
        return new KitchenConfig();
      });
      provider = services.build();

      expect(() => provider.resolve(IConfig)).toThrow(ProviderFailure);

      const config = provider.resolve(IConfig);
      expect(config).toBeInstanceOf(KitchenConfig);
      expect(provider.resolve(IConfig)).toBe(config);
      expect(attempts).toBe(2);
    });

    it('should reject an async provider under synchronous resolve', () => {
      services.addSingletonFactory(IConfig, async () => new KitchenConfig());
      provider = services.build();

      expect(() => provider.resolve(IConfig)).toThrow(/returned a promise; use resolveAsync\(\)/);
    });
  });

  // ============================================================================
  // Circular Dependency Tests
  // ============================================================================

  describe('circular dependency detection', () => {
    const IServiceA = createToken('IServiceA');
    const IServiceB = createToken('IServiceB');
    const IServiceC = createToken('IServiceC');

    it('should detect direct circular dependency before any provider runs', () => {
      // A -> B -> A
      const factoryA = vi.fn(() => 'a');
      const factoryB = vi.fn(() => 'b');

      services
        .addSingletonFactory(IServiceA, factoryA, { inject: [IServiceB] })
        .addSingletonFactory(IServiceB, factoryB, { inject: [IServiceA] });

      provider = services.build();

      expect(() => provider.resolve(IServiceA)).toThrow(CyclicDependencyError);
      expect(factoryA).not.toHaveBeenCalled();
      expect(factoryB).not.toHaveBeenCalled();
    });

    it('should detect indirect circular dependency', () => {
      // A -> B -> C -> A
      class ServiceA {
        static inject = [IServiceB] as const;
        constructor(public b: unknown) {}
      }

      class ServiceB {
        static inject = [IServiceC] as const;
        constructor(public c: unknown) {}
      }

      class ServiceC {
        static inject = [IServiceA] as const;
        constructor(public a: unknown) {}
      }

      services
        .addSingleton(IServiceA, ServiceA)
        .addSingleton(IServiceB, ServiceB)
        .addSingleton(IServiceC, ServiceC);

      provider = services.build();

      try {
        provider.resolve(IServiceB);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(CyclicDependencyError);
        expect((error as CyclicDependencyError).cyclePath).toEqual([
          'Symbol(IServiceB)',
          'Symbol(IServiceC)',
          'Symbol(IServiceA)',
          'Symbol(IServiceB)',
        ]);
      }
    });

    it('should name every key of the cycle', () => {
      services
        .addScopedFactory(IServiceA, () => 'a', { inject: [IServiceB] })
        .addScopedFactory(IServiceB, () => 'b', { inject: [IServiceA] });

      provider = services.build();

      try {
        provider.resolve(IServiceA);
        expect.fail('Should have thrown');
      } catch (error) {
        expect((error as CyclicDependencyError).cyclePath).toEqual([
          'Symbol(IServiceA)',
          'Symbol(IServiceB)',
          'Symbol(IServiceA)',
        ]);
      }
    });

    it('should detect a key depending on itself', () => {
      services.addTransientFactory(IServiceA, () => 'a', { inject: [IServiceA] });
      provider = services.build();

      expect(() => provider.resolve(IServiceA)).toThrow(
        'Circular dependency detected: Symbol(IServiceA) -> Symbol(IServiceA)',
      );
    });

    it('should report cycles at build time with validateGraph', () => {
      services
        .addSingletonFactory(IServiceA, () => 'a', { inject: [IServiceB] })
        .addSingletonFactory(IServiceB, () => 'b', { inject: [IServiceA] });

      expect(() => services.build({ validateGraph: true })).toThrow(CyclicDependencyError);
    });
  });

  // ============================================================================
  // Scope Mismatch Tests
  // ============================================================================

  describe('scope mismatch validation', () => {
    it('should throw ScopeMismatchError for Singleton -> Scoped at build time', () => {
      class SingletonService {
        static inject = [IFryer] as const;
        constructor(public fryer: IFryerInterface) {}
      }

      services.addScoped(IFryer, DeepFryer).addSingleton(SingletonService);

      expect(() => {
        services.build({ validateScopes: true });
      }).toThrow(ScopeMismatchError);
    });

    it('should allow Scoped -> Singleton', () => {
      class ScopedService {
        static inject = [IOven] as const;
        constructor(public oven: IOvenInterface) {}
      }

      services.addSingleton(IOven, GasOven).addScoped(ScopedService);

      provider = services.build({ validateScopes: true });

      const scope = provider.createScope();
      expect(scope.resolve(ScopedService).oven).toBeInstanceOf(GasOven);
    });

    it('should skip validation when validateScopes is false', () => {
      class SingletonService {
        static inject = [IFryer] as const;
        constructor(public fryer: IFryerInterface) {}
      }

      services.addScoped(IFryer, DeepFryer).addSingleton(SingletonService);

      provider = services.build({ validateScopes: false });
      expect(provider.resolve(SingletonService).fryer).toBeInstanceOf(DeepFryer);
    });

    it('should check child-scope bindings when the plan is built', () => {
      class Napkin {}
      class Plate {
        static inject = [Napkin] as const;
        constructor(readonly napkin: Napkin) {}
      }

      services.addTransient(Napkin);
      provider = services.build();

      const scope = provider.createScope({ configure: (child) => child.addScoped(Plate) });

      expect(() => scope.resolve(Plate)).toThrow(ScopeMismatchError);
    });

    it('should look up singleton dependencies from the owning scope', () => {
      class Kitchen {
        static inject = [IConfig] as const;
        constructor(readonly config: IConfigInterface) {}
      }

      services.addSingleton(Kitchen);
      provider = services.build();

      // IConfig exists only in the child, so the root-owned Kitchen cannot see it
      const scope = provider.createScope({
        configure: (child) => child.addSingleton(IConfig, KitchenConfig),
      });

      expect(() => scope.resolve(Kitchen)).toThrow(UnboundKeyError);
    });
  });

  // ============================================================================
  // tryResolve / resolveAll / resolveByTag Tests
  // ============================================================================

  describe('tryResolve', () => {
    it('should return undefined for unregistered service', () => {
      provider = services.build();

      expect(provider.tryResolve(IOven)).toBeUndefined();
    });

    it('should return instance for registered service', () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      expect(provider.tryResolve(IOven)).toBeInstanceOf(GasOven);
    });

    it('should still throw when a dependency of a bound key is missing', () => {
      services.addSingleton(LineCook);
      provider = services.build();

      expect(() => provider.tryResolve(LineCook)).toThrow(UnboundKeyError);
    });
  });

  describe('resolveAll', () => {
    it('should return the nearest binding as a single-element list', () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      const ovens = provider.resolveAll(IOven);

      expect(ovens).toHaveLength(1);
      expect(ovens[0]).toBe(provider.resolve(IOven));
    });

    it('should return an empty list for an unbound key', () => {
      provider = services.build();

      expect(provider.resolveAll(IOven)).toEqual([]);
    });
  });

  describe('resolveByTag', () => {
    it('should resolve tagged bindings in registration order', () => {
      services
        .addSingleton(IFryer, DeepFryer, { tags: ['station'] })
        .addSingleton(KitchenConfig)
        .addSingleton(IOven, GasOven, { tags: ['station'] });

      provider = services.build();

      const stations = provider.resolveByTag('station');

      expect(stations).toHaveLength(2);
      expect(stations[0]).toBeInstanceOf(DeepFryer);
      expect(stations[1]).toBeInstanceOf(GasOven);
    });

    it('should prefer a child binding over the parent one', () => {
      services.addScoped(IOven, GasOven, { tags: ['station'] });
      provider = services.build();

      const brickOven = { bake: (bread: string) => `wood-fired ${bread}` };
      const scope = provider.createScope({
        configure: (child) => child.addSingletonInstance(IOven, brickOven, { tags: ['station'] }),
      });

      expect(scope.resolveByTag('station')).toEqual([brickOven]);
    });
  });

  // ============================================================================
  // isRegistered Tests
  // ============================================================================

  describe('isRegistered', () => {
    it('should return true for registered service', () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      expect(provider.isRegistered(IOven)).toBe(true);
    });

    it('should return false for unregistered service', () => {
      provider = services.build();

      expect(provider.isRegistered(IOven)).toBe(false);
    });

    it('should report built-in tokens as registered', () => {
      provider = services.build();

      expect(provider.isRegistered(SERVICE_PROVIDER_TOKEN)).toBe(true);
      expect(provider.isRegistered(SERVICE_SCOPE_TOKEN)).toBe(true);
      expect(provider.isRegistered(SERVICE_SCOPE_FACTORY_TOKEN)).toBe(true);
    });
  });

  // ============================================================================
  // Built-in Token Tests
  // ============================================================================

  describe('built-in tokens', () => {
    it('should resolve the provider itself', () => {
      provider = services.build();

      expect(provider.resolve(SERVICE_PROVIDER_TOKEN)).toBe(provider);
    });

    it('should inject the resolving scope', () => {
      class OrderTicket {
        static inject = [SERVICE_SCOPE_TOKEN] as const;
        constructor(readonly scope: IServiceScope) {}
      }

      services.addScoped(OrderTicket);
      provider = services.build();

      const scope = provider.createScope({ name: 'order-7' });

      expect(scope.resolve(OrderTicket).scope).toBe(scope);
    });

    it('should inject a scope factory opening children of the resolving scope', () => {
      class Expediter {
        static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
        constructor(readonly scopes: IServiceScopeFactory) {}
      }

      services.addTransient(Expediter);
      provider = services.build();

      const session = provider.createScope({ name: 'session' });
      const child = session.resolve(Expediter).scopes.createScope({ name: 'ticket' });

      expect(child.parent).toBe(session);
      expect(child.name).toBe('ticket');
    });
  });

  // ============================================================================
  // Build Option Tests
  // ============================================================================

  describe('eagerSingletons', () => {
    it('should construct root singletons during build', () => {
      const factory = vi.fn(() => new KitchenConfig());
      services.addSingletonFactory(IConfig, factory).addScoped(IFryer, DeepFryer);

      provider = services.build({ eagerSingletons: true });

      expect(factory).toHaveBeenCalledTimes(1);
      provider.resolve(IConfig);
      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  // ============================================================================
  // Disposal Tests
  // ============================================================================

  describe('dispose', () => {
    it('should dispose singleton services', async () => {
      const IDisposableFryer = createToken<DisposableFryer>('IDisposableFryer');
      services.addSingleton(IDisposableFryer, DisposableFryer);
      provider = services.build();

      const instance = provider.resolve(IDisposableFryer);
      expect(instance.disposed).toBe(false);

      await provider.dispose();

      expect(instance.disposed).toBe(true);
    });

    it('should dispose scoped services when scope ends', async () => {
      const IDisposableFryer = createToken<DisposableFryer>('IDisposableFryer');
      services.addScoped(IDisposableFryer, DisposableFryer);
      provider = services.build();

      const scope = provider.createScope();
      const instance = scope.resolve(IDisposableFryer);

      expect(instance.disposed).toBe(false);

      await scope.dispose();

      expect(instance.disposed).toBe(true);
    });

    it('should never dispose transient services', async () => {
      services.addTransient(DisposableFryer);
      provider = services.build();

      const instance = provider.resolve(DisposableFryer);
      await provider.dispose();

      expect(instance.disposed).toBe(false);
    });

    it('should reject resolution after dispose', async () => {
      services.addSingleton(IOven, GasOven);
      provider = services.build();

      await provider.dispose();

      expect(() => provider.resolve(IOven)).toThrow(ScopeDisposedError);
    });
  });
});
