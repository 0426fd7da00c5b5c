/**
 * @fileoverview Attach Unit Tests
 *
 * Two-phase construction of host-created objects.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import {
  createToken,
  ScopeDisposedError,
  UnboundKeyError,
  type IAttachable,
} from '../../../src/domain/di';
import { ServiceCollection } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IPayments {
  charge(cents: number): string;
}

const IPayments = createToken<IPayments>('IPayments');
const IReceiptPrinter = createToken<{ print(): void }>('IReceiptPrinter');

class Cart {
  readonly items: string[] = [];
}

class CardTerminal implements IPayments {
  charge(cents: number): string {
    return `charged ${cents}`;
  }
}

class CheckoutScreen implements IAttachable {
  static inject = [Cart, IPayments] as const;

  cart?: Cart;
  payments?: IPayments;

  attach(cart: Cart, payments: IPayments): void {
    this.cart = cart;
    this.payments = payments;
  }
}

class ReceiptScreen implements IAttachable {
  static inject = [Cart, IReceiptPrinter] as const;

  attach = vi.fn();
}

class SplashScreen implements IAttachable {
  attach = vi.fn();
}

// ============================================================================
// Tests
// ============================================================================

describe('attach', () => {
  it('should hand the declared dependencies to attach()', () => {
    const services = new ServiceCollection();
    services.addScoped(Cart).addSingleton(IPayments, CardTerminal);
    const provider = services.build();
    const order = provider.createScope({ name: 'order-7' });

    const screen = order.attach(new CheckoutScreen());

    expect(screen.cart).toBe(order.resolve(Cart));
    expect(screen.payments?.charge(450)).toBe('charged 450');
  });

  it('should share scoped dependencies between attached objects of one scope', () => {
    const services = new ServiceCollection();
    services.addScoped(Cart).addSingleton(IPayments, CardTerminal);
    const provider = services.build();
    const order = provider.createScope();

    const first = order.attach(new CheckoutScreen());
    const second = order.attach(new CheckoutScreen());

    expect(first.cart).toBe(second.cart);
  });

  it('should call attach() without arguments when nothing is declared', () => {
    const provider = new ServiceCollection().build();

    const screen = provider.attach(new SplashScreen());

    expect(screen.attach).toHaveBeenCalledWith();
  });

  it('should fail before constructing anything when a dependency is unbound', () => {
    const cartFactory = vi.fn(() => new Cart());
    const services = new ServiceCollection();
    services.addScopedFactory(Cart, cartFactory);
    const provider = services.build();
    const screen = new ReceiptScreen();

    expect(() => provider.attach(screen)).toThrow(UnboundKeyError);
    expect(cartFactory).not.toHaveBeenCalled();
    expect(screen.attach).not.toHaveBeenCalled();
  });

  it('should refuse to attach in a closed scope', async () => {
    const services = new ServiceCollection();
    services.addScoped(Cart).addSingleton(IPayments, CardTerminal);
    const provider = services.build();
    const order = provider.createScope();
    await order.dispose();

    expect(() => order.attach(new CheckoutScreen())).toThrow(ScopeDisposedError);
  });
});
