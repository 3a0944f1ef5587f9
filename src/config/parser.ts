/**
 * TOML configuration parser for ha-config-guard.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isLogLevel } from '../utils/logger.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_CONSTRAINTS,
  DEFAULT_LOGGING,
  DEFAULT_RESOLVER,
} from './defaults.js';
import type { Config, ConstraintsConfig, LoggingConfig, ResolverConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Returns the table stored under `name`, or undefined when the section is
 * absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function sectionOf(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  if (!(name in parsed)) {
    return undefined;
  }
  const section = parsed[name];
  if (!isTable(section)) {
    throw new ConfigParseError(
      `Invalid type for '${name}': expected table, got ${describeType(section)}`
    );
  }
  return section;
}

function parseResolver(raw: Record<string, unknown> | undefined): ResolverConfig {
  const result: ResolverConfig = { ...DEFAULT_RESOLVER };
  if (raw !== undefined && 'timeout_ms' in raw) {
    result.timeout_ms = validateNumber(raw.timeout_ms, 'resolver.timeout_ms');
  }
  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'level' in raw) {
    const level = validateString(raw.level, 'logging.level');
    if (!isLogLevel(level)) {
      throw new ConfigParseError(
        `Invalid value for 'logging.level': expected 'debug', 'info', 'warn', or 'error', got '${level}'`
      );
    }
    result.level = level;
  }
  return result;
}

function parseConstraints(raw: Record<string, unknown> | undefined): ConstraintsConfig {
  const result: ConstraintsConfig = { ...DEFAULT_CONSTRAINTS };
  if (raw !== undefined && 'id_prefix' in raw) {
    result.id_prefix = validateString(raw.id_prefix, 'constraints.id_prefix');
  }
  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Only types are checked here; ranges and formats are checked by
 * {@link validateConfig}.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const config = parseConfig(`
 * [resolver]
 * timeout_ms = 500
 * `);
 * console.log(config.resolver.timeout_ms); // 500
 * console.log(config.logging.level); // "info"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(`Invalid TOML syntax: ${cause?.message ?? String(error)}`, cause);
  }

  return {
    resolver: parseResolver(sectionOf(parsed, 'resolver')),
    logging: parseLogging(sectionOf(parsed, 'logging')),
    constraints: parseConstraints(sectionOf(parsed, 'constraints')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    resolver: { ...DEFAULT_CONFIG.resolver },
    logging: { ...DEFAULT_CONFIG.logging },
    constraints: { ...DEFAULT_CONFIG.constraints },
  };
}
