/**
 * Validation schema for example definitions.
 */
import { z } from 'zod';
import type { ExampleFactory } from '../contract/types.js';

export const CategorySchema = z.enum(['creational', 'structural', 'behavioral']);

export const ExampleDefinitionSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  category: CategorySchema,
  factory: z.custom<ExampleFactory>((value) => typeof value === 'function', {
    message: 'factory must be a function',
  }),
  expectedOutcome: z.array(z.string()).optional(),
});
