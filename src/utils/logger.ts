/**
 * Structured logging for validation runs and constraint changes.
 *
 * Every entry is one JSON line on stderr, so the surrounding tooling can keep
 * stdout for its own output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All log levels in ascending order.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Type guard for log level names.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Represents a structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp when the entry was created. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that produced the entry.
   * @example "AddressResolver"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "address_unresolvable"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Entries below this level are dropped.
   * @defaultValue 'info'
   */
  readonly level?: LogLevel | undefined;
}

/**
 * Structured logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConstraintBuilder', level: 'debug' });
 * logger.debug('constraint_created', { id: 'ha_order_set_A_B' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly threshold: number;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  }

  /**
   * Returns a logger for another component with the same level.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, level: this.level });
  }

  /** The lowest level this logger writes. */
  get level(): LogLevel {
    return LOG_LEVELS[this.threshold] ?? 'info';
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data === undefined ? {} : { data }),
    };
    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry; data that JSON cannot represent (cycles, BigInt) is
 * replaced by a marker and the serialization error.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _dropped, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Default logger, used when no validation environment is supplied.
 */
export const logger = new Logger({ component: 'ha-config-guard' });
