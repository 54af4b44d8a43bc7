/**
 * Tests for the config schema.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, OutputFormatSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every default from an empty object', () => {
    const config = ConfigSchema.parse({});

    expect(config.run.time_budget_ms).toBe(1000);
    expect(config.output.format).toBe('compact');
  });

  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ run: null, output: null });

    expect(config.run.seed).toBe(42);
    expect(config.output.colors).toBe(true);
  });

  it('should reject a fractional time budget', () => {
    expect(ConfigSchema.safeParse({ run: { time_budget_ms: 1.5 } }).success).toBe(false);
  });

  it('should reject an unknown log level', () => {
    expect(ConfigSchema.safeParse({ log_level: 'loud' }).success).toBe(false);
  });
});

describe('OutputFormatSchema', () => {
  it('should accept the three formats', () => {
    for (const format of ['compact', 'human', 'json']) {
      expect(OutputFormatSchema.safeParse(format).success).toBe(true);
    }
  });
});
