/**
 * Adapter: a Fahrenheit sensor used where a Celsius thermometer is expected.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

interface Thermometer {
  celsius(): number;
}

class FahrenheitSensor {
  constructor(private readonly reading: number) {}

  readFahrenheit(): number {
    return this.reading;
  }
}

class FahrenheitAdapter implements Thermometer {
  constructor(readonly sensor: FahrenheitSensor) {}

  celsius(): number {
    return Math.round(((this.sensor.readFahrenheit() - 32) * 5) / 9);
  }
}

export const ADAPTER_OUTCOME = [
  'sensor at 212F reports 100C',
  'sensor at 32F reports 0C',
  'sensor at 50F reports 10C',
];

export class AdapterExample implements PatternExample {
  private thermometers: FahrenheitAdapter[] = [];

  setup(): void {
    this.thermometers = [212, 32, 50].map((f) => new FahrenheitAdapter(new FahrenheitSensor(f)));
  }

  run(): readonly string[] {
    return this.thermometers.map(
      (t) => `sensor at ${t.sensor.readFahrenheit()}F reports ${t.celsius()}C`
    );
  }

  describe(): ExampleDescription {
    return {
      name: 'Adapter',
      intent: 'Convert the interface of a class into another interface clients expect',
    };
  }
}
