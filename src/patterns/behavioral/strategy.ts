/**
 * Strategy: checkout delegates payment to an interchangeable strategy.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

interface PaymentStrategy {
  pay(amount: number): string;
}

const creditCard: PaymentStrategy = {
  pay: (amount) => `paid ${amount} with credit card`,
};

const payPal: PaymentStrategy = {
  pay: (amount) => `paid ${amount} using PayPal`,
};

class Checkout {
  constructor(private strategy: PaymentStrategy) {}

  use(strategy: PaymentStrategy): void {
    this.strategy = strategy;
  }

  complete(amount: number): string {
    return this.strategy.pay(amount);
  }
}

export const STRATEGY_OUTCOME = ['paid 15 with credit card', 'paid 15 using PayPal'];

export class StrategyExample implements PatternExample {
  private checkout?: Checkout;

  setup(): void {
    this.checkout ??= new Checkout(creditCard);
  }

  run(): readonly string[] {
    const checkout = requireSetup(this.checkout, 'Strategy');
    checkout.use(creditCard);
    const first = checkout.complete(15);
    checkout.use(payPal);
    return [first, checkout.complete(15)];
  }

  describe(): ExampleDescription {
    return {
      name: 'Strategy',
      intent: 'Define a family of algorithms and make them interchangeable at runtime',
    };
  }
}
