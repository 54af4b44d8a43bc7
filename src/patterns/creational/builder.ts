/**
 * Builder: assemble a burger step by step, with a director for a standard recipe.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Burger {
  readonly bun: string;
  readonly patties: number;
  readonly toppings: readonly string[];
}

class BurgerBuilder {
  private bun = 'plain';
  private patties = 1;
  private readonly toppings: string[] = [];

  withBun(bun: string): this {
    this.bun = bun;
    return this;
  }

  addPatty(): this {
    this.patties++;
    return this;
  }

  addTopping(topping: string): this {
    this.toppings.push(topping);
    return this;
  }

  build(): Burger {
    return { bun: this.bun, patties: this.patties, toppings: [...this.toppings] };
  }
}

function buildCheeseburger(builder: BurgerBuilder): Burger {
  return builder.withBun('sesame').addPatty().addTopping('cheese').addTopping('lettuce').build();
}

function describeBurger(burger: Burger): string {
  const toppings = burger.toppings.length > 0 ? burger.toppings.join(', ') : 'nothing';
  return `${burger.patties} patty burger on ${burger.bun} bun with ${toppings}`;
}

export const BUILDER_OUTCOME = [
  'basic: 1 patty burger on plain bun with nothing',
  'cheeseburger: 2 patty burger on sesame bun with cheese, lettuce',
];

export class BuilderExample implements PatternExample {
  setup(): void {}

  run(): readonly string[] {
    return [
      `basic: ${describeBurger(new BurgerBuilder().build())}`,
      `cheeseburger: ${describeBurger(buildCheeseburger(new BurgerBuilder()))}`,
    ];
  }

  describe(): ExampleDescription {
    return {
      name: 'Builder',
      intent: 'Separate the construction of a complex object from its representation',
    };
  }
}
