/**
 * Decorator: add-ons wrap a beverage and extend its cost and description.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Beverage {
  /** Price in cents */
  cost(): number;
  description(): string;
}

function espresso(): Beverage {
  return { cost: () => 200, description: () => 'espresso' };
}

function withAddOn(beverage: Beverage, name: string, cents: number): Beverage {
  return {
    cost: () => beverage.cost() + cents,
    description: () => `${beverage.description()} + ${name}`,
  };
}

const withMilk = (beverage: Beverage) => withAddOn(beverage, 'milk', 50);
const withCaramel = (beverage: Beverage) => withAddOn(beverage, 'caramel', 75);

function formatOrder(beverage: Beverage): string {
  return `${beverage.description()}: $${(beverage.cost() / 100).toFixed(2)}`;
}

export const DECORATOR_OUTCOME = [
  'espresso: $2.00',
  'espresso + milk: $2.50',
  'espresso + milk + caramel: $3.25',
];

export class DecoratorExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    const plain = espresso();
    const latte = withMilk(plain);
    const caramelLatte = withCaramel(latte);
    return [plain, latte, caramelLatte].map(formatOrder);
  }

  describe(): ExampleDescription {
    return {
      name: 'Decorator',
      intent: 'Attach additional responsibilities to an object dynamically',
    };
  }
}
