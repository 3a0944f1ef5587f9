/**
 * Configuration types for ha-config-guard.toml parsing.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Host name resolution settings.
 */
export interface ResolverConfig {
  /** Upper bound for one lookup in milliseconds (default: 2000). */
  timeout_ms: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Entries below this level are dropped (default: 'info'). */
  level: LogLevel;
}

/**
 * Constraint builder settings.
 */
export interface ConstraintsConfig {
  /** Prefix of generated constraint and resource set ids (default: 'ha'). */
  id_prefix: string;
}

/**
 * Complete configuration object parsed from ha-config-guard.toml.
 */
export interface Config {
  resolver: ResolverConfig;
  logging: LoggingConfig;
  constraints: ConstraintsConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  resolver?: Partial<ResolverConfig>;
  logging?: Partial<LoggingConfig>;
  constraints?: Partial<ConstraintsConfig>;
}
