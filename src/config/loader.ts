/**
 * Loads ha-config-guard.toml and turns it into the collaborators the
 * validators and the constraint builder take.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { DnsAddressResolver, type AddressResolver } from '../corosync/address.js';
import { Logger } from '../utils/logger.js';
import { mergeConfig, readEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid, ConfigValidationError } from './validator.js';

/**
 * Default configuration file name, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'ha-config-guard.toml';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env). */
  readonly env?: EnvRecord | undefined;
}

/**
 * Reads, parses, overrides and validates a configuration file.
 *
 * A missing file yields the defaults (still subject to environment
 * overrides).
 *
 * @param filePath - Path of the TOML file.
 * @param options - Loading options.
 * @returns The validated configuration.
 * @throws ConfigParseError for unreadable files or invalid TOML.
 * @throws ConfigValidationError listing every malformed environment override,
 *   or the out-of-range values.
 */
export async function loadConfig(
  filePath: string = CONFIG_FILE_NAME,
  options: LoadConfigOptions = {}
): Promise<Config> {
  let fileConfig: Config;
  try {
    fileConfig = parseConfig(await readFile(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw error;
    }
    if (!isMissingFile(error)) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigParseError(
        `Failed to read configuration file ${filePath}: ${cause?.message ?? String(error)}`,
        cause
      );
    }
    fileConfig = getDefaultConfig();
  }

  const { overrides, errors } = readEnvOverrides(options.env ?? process.env, {
    collectErrors: true,
  });
  if (errors.length > 0) {
    const details = errors.map((err) => `  - ${err.envVar}: ${err.message}`).join('\n');
    throw new ConfigValidationError(
      `Invalid environment overrides (${String(errors.length)}):\n${details}`,
      errors.map((err) => ({ field: err.envVar, value: err.rawValue, message: err.message }))
    );
  }
  const config = mergeConfig(fileConfig, overrides);
  assertConfigValid(config);
  return config;
}

/**
 * Collaborators built from a configuration.
 */
export interface ValidationEnvironment {
  readonly logger: Logger;
  readonly resolver: AddressResolver;
  /** Prefix for generated constraint and resource set ids. */
  readonly idPrefix: string;
}

/**
 * Builds the logger, the DNS resolver and the id prefix described by `config`.
 *
 * @example
 * ```typescript
 * const env = createValidationEnvironment(await loadConfig());
 * const reports = await create('cluster', nodes, 'knet', {
 *   resolver: env.resolver,
 *   logger: env.logger,
 * });
 * ```
 */
export function createValidationEnvironment(config: Config): ValidationEnvironment {
  const logger = new Logger({ component: 'ha-config-guard', level: config.logging.level });
  return {
    logger,
    resolver: new DnsAddressResolver({ timeoutMs: config.resolver.timeout_ms, logger }),
    idPrefix: config.constraints.id_prefix,
  };
}
