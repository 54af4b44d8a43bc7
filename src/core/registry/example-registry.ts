/**
 * Process-wide catalogue of pattern examples, keyed by name.
 * Registration happens at startup; seal() closes that phase before runs begin.
 */
import type { Category, ExampleDefinition } from '../contract/types.js';
import {
  DuplicateNameError,
  ErrorCodes,
  NotFoundError,
  RegistryError,
} from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { ExampleDefinitionSchema } from './schema.js';

export class ExampleRegistry {
  private readonly examples = new Map<string, ExampleDefinition>();
  private sealed = false;

  /**
   * Register an example.
   * Rejects invalid definitions, duplicate names and registrations after seal().
   * A rejected call leaves the registry unchanged.
   */
  register(definition: ExampleDefinition): void {
    if (this.sealed) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_SEALED,
        `Cannot register "${definition.name}": registration is closed`,
        { name: definition.name }
      );
    }

    const parsed = ExampleDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new RegistryError(
        ErrorCodes.INVALID_EXAMPLE,
        `Invalid example definition: ${formatZodError(parsed.error)}`,
        { errors: parsed.error.issues }
      );
    }

    if (this.examples.has(definition.name)) {
      throw new DuplicateNameError(definition.name);
    }

    const { expectedOutcome } = definition;
    const record: ExampleDefinition = Object.freeze({
      name: definition.name,
      category: definition.category,
      factory: definition.factory,
      ...(expectedOutcome ? { expectedOutcome: Object.freeze([...expectedOutcome]) } : {}),
    });
    this.examples.set(record.name, record);
  }

  /**
   * Get an example by name.
   * @throws NotFoundError when nothing is registered under the name
   */
  lookup(name: string): ExampleDefinition {
    const example = this.examples.get(name);
    if (!example) {
      throw new NotFoundError(name);
    }
    return example;
  }

  has(name: string): boolean {
    return this.examples.has(name);
  }

  get size(): number {
    return this.examples.size;
  }

  /**
   * All examples in registration order.
   * The returned iterable restarts from the first example every time it is iterated.
   */
  all(): Iterable<ExampleDefinition> {
    const examples = this.examples;
    return {
      [Symbol.iterator]: () => examples.values(),
    };
  }

  /**
   * Examples of one category, in registration order. Re-iterable like all().
   */
  byCategory(category: Category): Iterable<ExampleDefinition> {
    const examples = this.examples;
    return {
      *[Symbol.iterator]() {
        for (const example of examples.values()) {
          if (example.category === category) {
            yield example;
          }
        }
      },
    };
  }

  names(): string[] {
    return Array.from(this.examples.keys());
  }

  /**
   * Close the registration phase. Later register() calls fail.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Remove every example and reopen registration.
   * Mainly for testing.
   */
  clear(): void {
    this.examples.clear();
    this.sealed = false;
  }
}

/**
 * Global example registry instance.
 */
export const exampleRegistry = new ExampleRegistry();
