/**
 * Prototype: new objects are copied from registered prototypes.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';
import { requireSetup } from '../shared.js';

interface Cloneable<T> {
  clone(): T;
}

class Sheep implements Cloneable<Sheep> {
  constructor(
    public name: string,
    public readonly tags: string[]
  ) {}

  clone(): Sheep {
    return new Sheep(this.name, [...this.tags]);
  }

  toString(): string {
    return `${this.name} [${this.tags.join(', ')}]`;
  }
}

export const PROTOTYPE_OUTCOME = [
  'original: Jolly [wool]',
  'clone: Dolly [wool, cloned]',
  'shares tags array: false',
];

export class PrototypeExample implements PatternExample {
  private prototypes?: Map<string, Sheep>;

  setup(): void {
    this.prototypes ??= new Map([['sheep', new Sheep('Jolly', ['wool'])]]);
  }

  run(): readonly string[] {
    const original = requireSetup(requireSetup(this.prototypes, 'Prototype').get('sheep'), 'Prototype');
    const copy = original.clone();
    copy.name = 'Dolly';
    copy.tags.push('cloned');

    return [
      `original: ${original.toString()}`,
      `clone: ${copy.toString()}`,
      `shares tags array: ${original.tags === copy.tags}`,
    ];
  }

  describe(): ExampleDescription {
    return {
      name: 'Prototype',
      intent: 'Create new objects by copying a prototypical instance',
    };
  }
}
