/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser cannot: the resolver timeout stays in a sane range
 * and the id prefix yields valid XML ids.
 *
 * @packageDocumentation
 */

import { validateId } from '../cib/tools.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/** Bounds of `resolver.timeout_ms`, inclusive. */
export const RESOLVER_TIMEOUT_RANGE = { min: 1, max: 60000 } as const;

function validateTimeout(value: number, errors: ValidationError[]): void {
  const { min, max } = RESOLVER_TIMEOUT_RANGE;
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push({
      field: 'resolver.timeout_ms',
      value,
      message: `'resolver.timeout_ms' must be an integer between ${String(min)} and ${String(max)}, got ${String(value)}`,
    });
  }
}

function validateIdPrefix(value: string, errors: ValidationError[]): void {
  for (const report of validateId(value, 'id prefix')) {
    const { invalidCharacter, isFirstChar } = report.payload;
    const problem =
      invalidCharacter === ''
        ? 'must not be empty'
        : `has invalid ${isFirstChar ? 'first ' : ''}character '${invalidCharacter}'`;
    errors.push({
      field: 'constraints.id_prefix',
      value,
      message: `'constraints.id_prefix' ${problem}`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateTimeout(config.resolver.timeout_ms, errors);
  validateIdPrefix(config.constraints.id_prefix, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
