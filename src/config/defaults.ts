/**
 * Default configuration values for ha-config-guard.toml.
 *
 * @packageDocumentation
 */

import type { Config, ConstraintsConfig, LoggingConfig, ResolverConfig } from './types.js';

/**
 * Default resolver settings. Two seconds covers a slow DNS server without
 * stalling a validation run on a dead one.
 */
export const DEFAULT_RESOLVER: ResolverConfig = {
  timeout_ms: 2000,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info',
};

export const DEFAULT_CONSTRAINTS: ConstraintsConfig = {
  id_prefix: 'ha',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  resolver: DEFAULT_RESOLVER,
  logging: DEFAULT_LOGGING,
  constraints: DEFAULT_CONSTRAINTS,
};
