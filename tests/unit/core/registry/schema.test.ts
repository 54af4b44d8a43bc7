import { describe, it, expect } from 'vitest';
import { CategorySchema, ExampleDefinitionSchema } from '../../../../src/core/registry/schema.js';

describe('ExampleDefinitionSchema', () => {
  const factory = () => ({
    setup: () => {},
    run: () => [],
    describe: () => ({ name: 'x', intent: 'y' }),
  });

  it('accepts a complete definition', () => {
    const result = ExampleDefinitionSchema.safeParse({
      name: 'Strategy',
      category: 'behavioral',
      factory,
      expectedOutcome: ['paid 15 with credit card'],
    });
    expect(result.success).toBe(true);
  });

  it('accepts a definition without expected outcome', () => {
    expect(ExampleDefinitionSchema.safeParse({ name: 'A', category: 'creational', factory }).success).toBe(true);
  });

  it('rejects a factory that is not a function', () => {
    const result = ExampleDefinitionSchema.safeParse({ name: 'A', category: 'creational', factory: 'nope' });
    expect(result.success).toBe(false);
  });

  it('rejects non-string expected lines', () => {
    const result = ExampleDefinitionSchema.safeParse({
      name: 'A',
      category: 'creational',
      factory,
      expectedOutcome: [1, 2],
    });
    expect(result.success).toBe(false);
  });
});

describe('CategorySchema', () => {
  it('lists the three GoF families', () => {
    expect(CategorySchema.options).toEqual(['creational', 'structural', 'behavioral']);
  });
});
