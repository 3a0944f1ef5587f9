/**
 * Environment variable overrides for configuration.
 *
 * Provides HA_GUARD_* environment variables that override configuration
 * values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a log level, case-insensitive.
 *
 * @throws EnvCoercionError for an unknown level.
 */
function coerceToLogLevel(value: string, envVar: string): Config['logging']['level'] {
  const trimmed = value.trim().toLowerCase();
  if (!isLogLevel(trimmed)) {
    throw new EnvCoercionError(
      envVar,
      value,
      'log level',
      `Cannot coerce '${envVar}' value '${value}' to log level. Expected one of: ${LOG_LEVELS.join(', ')}`
    );
  }
  return trimmed;
}

/** Coerces `value` and stores it in `overrides`. */
type EnvVarMapping = (overrides: PartialConfig, value: string, envVar: string) => void;

const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvVarMapping> = new Map<string, EnvVarMapping>([
  // Host name lookup timeout in milliseconds
  [
    'HA_GUARD_RESOLVER_TIMEOUT_MS',
    (overrides, value, envVar) => {
      overrides.resolver = { ...overrides.resolver, timeout_ms: coerceToNumber(value, envVar) };
    },
  ],
  // debug, info, warn or error
  [
    'HA_GUARD_LOG_LEVEL',
    (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, level: coerceToLogLevel(value, envVar) };
    },
  ],
  // Prefix of generated constraint ids
  [
    'HA_GUARD_CONSTRAINT_ID_PREFIX',
    (overrides, value) => {
      overrides.constraints = { ...overrides.constraints, id_prefix: value };
    },
  ],
]);

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ HA_GUARD_LOG_LEVEL: 'debug' });
 * console.log(result.overrides.logging?.level); // "debug"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, apply] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns A new configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Merges a partial configuration into a full configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    resolver: {
      ...base.resolver,
      ...partial.resolver,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
    constraints: {
      ...base.constraints,
      ...partial.constraints,
    },
  };
}
