/**
 * The uniform contract every pattern example implements.
 */
/** GoF pattern family. */
export type Category = 'creational' | 'structural' | 'behavioral';

export const CATEGORIES: readonly Category[] = ['creational', 'structural', 'behavioral'];

/**
 * Name and one-line intent, used for reporting only.
 */
export interface ExampleDescription {
  name: string;
  intent: string;
}

/**
 * A runnable pattern demonstration.
 *
 * - `setup()` wires collaborators. Calling it twice has the same effect as calling it once.
 *   Throws SetupError when a collaborator is unavailable.
 * - `run()` plays the scenario end to end and returns the lines it produced.
 *   Must be deterministic; randomness comes from an injected RandomSource.
 */
export interface PatternExample {
  setup(): void;
  run(): readonly string[];
  describe(): ExampleDescription;
}

/**
 * Zero-argument constructor for a fresh example instance.
 */
export type ExampleFactory = () => PatternExample;

/**
 * A registered example.
 */
export interface ExampleDefinition {
  /** Unique registry key */
  readonly name: string;
  readonly category: Category;
  readonly factory: ExampleFactory;
  /** Lines run() must produce, in order. No verification when absent. */
  readonly expectedOutcome?: readonly string[];
}

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}
