/**
 * Error types and codes for patternbench.
 * All harness errors extend HarnessError.
 */

/**
 * Base error class for all harness errors.
 */
export class HarnessError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarnessError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Registry-related errors (invalid definitions, sealed registry).
 */
export class RegistryError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * An example with the same name is already registered.
 */
export class DuplicateNameError extends RegistryError {
  constructor(public readonly exampleName: string) {
    super(ErrorCodes.DUPLICATE_NAME, `Example "${exampleName}" is already registered`, {
      name: exampleName,
    });
    this.name = 'DuplicateNameError';
  }
}

/**
 * No example is registered under the requested name.
 */
export class NotFoundError extends RegistryError {
  constructor(public readonly exampleName: string) {
    super(ErrorCodes.NOT_FOUND, `No example registered under "${exampleName}"`, {
      name: exampleName,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * An example's setup() could not complete.
 * Thrown by examples; the runner turns it into an errored result.
 */
export class SetupError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.SETUP_FAILED, message, details);
    this.name = 'SetupError';
  }
}

/**
 * An example's output did not match its expected outcome.
 * `line` is 1-based; `expected`/`actual` are undefined when the line is missing on that side.
 */
export class FailureMismatch extends HarnessError {
  constructor(
    public readonly line: number,
    public readonly expected: string | undefined,
    public readonly actual: string | undefined
  ) {
    super(ErrorCodes.OUTPUT_MISMATCH, describeMismatch(line, expected, actual), {
      line,
      expected,
      actual,
    });
    this.name = 'FailureMismatch';
  }
}

function describeMismatch(line: number, expected: string | undefined, actual: string | undefined): string {
  if (expected === undefined) {
    return `line ${line}: unexpected extra line ${JSON.stringify(actual ?? '')}`;
  }
  const got = actual === undefined ? 'nothing' : JSON.stringify(actual);
  return `line ${line}: expected ${JSON.stringify(expected)}, got ${got}`;
}

export const ErrorCodes = {
  // Registry errors
  DUPLICATE_NAME: 'R001',
  NOT_FOUND: 'R002',
  INVALID_EXAMPLE: 'R003',
  REGISTRY_SEALED: 'R004',

  // Run errors
  SETUP_FAILED: 'X001',
  RUN_FAILED: 'X002',
  INVALID_OUTPUT: 'X003',
  TIME_BUDGET_EXCEEDED: 'X004',
  OUTPUT_MISMATCH: 'X005',
  ILLEGAL_TRANSITION: 'X006',

  // System errors
  PARSE_ERROR: 'S001',
  CONFIG_LOAD_ERROR: 'S002',
  INVALID_CONFIG: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
