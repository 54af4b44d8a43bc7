/**
 * Factory Method: Logistics defers the choice of Transport to an injected creator.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

interface Transport {
  deliver(cargo: string): string;
}

class Truck implements Transport {
  deliver(cargo: string): string {
    return `truck delivers ${cargo} by road`;
  }
}

class Ship implements Transport {
  deliver(cargo: string): string {
    return `ship delivers ${cargo} by sea`;
  }
}

class Logistics {
  constructor(private readonly createTransport: () => Transport) {}

  planDelivery(cargo: string): string {
    return this.createTransport().deliver(cargo);
  }
}

export const FACTORY_METHOD_OUTCOME = [
  'truck delivers furniture by road',
  'ship delivers containers by sea',
];

export class FactoryMethodExample implements PatternExample {
  private road?: Logistics;
  private sea?: Logistics;

  setup(): void {
    this.road ??= new Logistics(() => new Truck());
    this.sea ??= new Logistics(() => new Ship());
  }

  run(): readonly string[] {
    const road = requireSetup(this.road, 'FactoryMethod');
    const sea = requireSetup(this.sea, 'FactoryMethod');
    return [road.planDelivery('furniture'), sea.planDelivery('containers')];
  }

  describe(): ExampleDescription {
    return {
      name: 'FactoryMethod',
      intent: 'Let a creator decide which concrete product to instantiate',
    };
  }
}
