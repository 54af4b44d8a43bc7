/**
 * Singleton: one process-scoped settings store behind an accessor.
 */
import type { ExampleDescription, PatternExample } from '../../core/contract/types.js';

class SettingsStore {
  private readonly values = new Map<string, string>();

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }
}

let store: SettingsStore | undefined;
let constructions = 0;

/**
 * The one SettingsStore, created on first access.
 * Node runs this synchronously on a single thread, so the check-then-create cannot interleave.
 */
export function getSettingsStore(): SettingsStore {
  if (!store) {
    store = new SettingsStore();
    constructions++;
  }
  return store;
}

export function settingsStoreConstructions(): number {
  return constructions;
}

export const SINGLETON_OUTCOME = [
  'same instance: true',
  'instances created: 1',
  'theme via second reference: dark',
];

export class SingletonExample implements PatternExample {
  setup(): void {
    getSettingsStore();
  }

  run(): readonly string[] {
    const first = getSettingsStore();
    const second = getSettingsStore();
    first.set('theme', 'dark');

    return [
      `same instance: ${first === second}`,
      `instances created: ${settingsStoreConstructions()}`,
      `theme via second reference: ${second.get('theme') ?? '(unset)'}`,
    ];
  }

  describe(): ExampleDescription {
    return {
      name: 'Singleton',
      intent: 'Ensure a class has only one instance and provide a global point of access to it',
    };
  }
}
