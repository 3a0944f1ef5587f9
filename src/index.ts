/**
 * ha-config-guard
 *
 * Validation for corosync cluster configuration and a builder for CIB
 * constraints that reference resource sets.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Report items and the forcing rules shared by every check
export * from './reports/index.js';

// Option validation framework
export * from './validate/index.js';

// Corosync configuration validators
export * from './corosync/index.js';

// Configuration tree and constraint builder
export * from './cib/index.js';

// Configuration file, environment overrides and collaborators
export * from './config/index.js';

// Structured logging
export { isLogLevel, LOG_LEVELS, Logger, logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
