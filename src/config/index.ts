/**
 * Configuration module for ha-config-guard.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  ConstraintsConfig,
  LoggingConfig,
  PartialConfig,
  ResolverConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONSTRAINTS,
  DEFAULT_LOGGING,
  DEFAULT_RESOLVER,
} from './defaults.js';
export {
  ConfigValidationError,
  RESOLVER_TIMEOUT_RANGE,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export {
  CONFIG_FILE_NAME,
  createValidationEnvironment,
  loadConfig,
} from './loader.js';
export type { LoadConfigOptions, ValidationEnvironment } from './loader.js';
