/**
 * Configuration schema for .patternbench.yaml.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and fills in its inner defaults when missing.
 * Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const OutputFormatSchema = z.enum(['compact', 'human', 'json']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Runner settings. */
export const RunSettingsSchema = z.object({
  /** Soft per-example budget for setup + run */
  time_budget_ms: z.number().int().positive().default(1000),
  /** Seed for examples that need a random source */
  seed: z.number().int().default(42),
});

/** Report settings. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('compact'),
  colors: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  run: withDefaults(RunSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  log_level: LogLevelSchema.default('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RunSettings = z.infer<typeof RunSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
