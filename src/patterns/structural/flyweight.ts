/**
 * Flyweight: particles share cached color objects; only position is per-particle.
 * Each run draws colors from a fresh source made by the injected factory.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { pick, type RandomSource } from '../../utils/random.js';

interface Color {
  readonly name: string;
  readonly hex: string;
}

const PALETTE: Record<string, string> = {
  red: '#ff0000',
  green: '#00ff00',
  blue: '#0000ff',
};

const COLOR_NAMES = Object.keys(PALETTE);

const PARTICLE_COUNT = 6;

class ColorFactory {
  private readonly cache = new Map<string, Color>();

  get(name: string): Color {
    let color = this.cache.get(name);
    if (!color) {
      color = Object.freeze({ name, hex: PALETTE[name] ?? '#000000' });
      this.cache.set(name, color);
    }
    return color;
  }

  get size(): number {
    return this.cache.size;
  }
}

interface Particle {
  readonly x: number;
  readonly color: Color;
}

export class FlyweightExample implements PatternExample {
  private readonly colors = new ColorFactory();

  constructor(private readonly createRandom: () => RandomSource) {}

  setup(): void {
    for (const name of COLOR_NAMES) {
      this.colors.get(name);
    }
  }

  run(): readonly string[] {
    const random = this.createRandom();
    const particles: Particle[] = [];
    for (let i = 0; i < PARTICLE_COUNT; i++) {
      particles.push({ x: i * 10, color: this.colors.get(pick(random, COLOR_NAMES)) });
    }

    const distinct = new Set(particles.map((p) => p.color));
    return [
      ...particles.map((p, i) => `particle ${i + 1} at x=${p.x}: ${p.color.name} (${p.color.hex})`),
      `distinct color objects: ${distinct.size}`,
      `cached flyweights: ${this.colors.size}`,
    ];
  }

  describe(): ExampleDescription {
    return {
      name: 'Flyweight',
      intent: 'Share fine-grained objects to support large numbers of them efficiently',
    };
  }
}
