/**
 * Structured logging utility for the documentation engine.
 *
 * Writes one JSON object per line to stderr so that engine runs can be
 * traced by the tooling that invokes them.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-element pipeline details, only emitted in debug mode
 * - `info`: run-level progress
 * - `warn`: conditions that degrade a result but do not stop the run
 * - `error`: element or run failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "Engine"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "element_analyzed"
   */
  readonly event: string;

  /** Additional JSON-serializable context. */
  readonly data?: Record<string, unknown>;

  /** Set when `data` could not be serialized. */
  readonly serializationError?: string;

  /** Placeholder written in place of unserializable data. */
  readonly originalData?: string;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Engine', debugMode: true });
 * logger.info('run_started', { elements: 12 });
 * logger.warn('element_failed', { qualifiedPath: 'billing.Account.transfer' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Returns a logger for another component sharing this logger's debug mode.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined && { data }),
    };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      const fallback: LogEntry = {
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      };
      line = JSON.stringify(fallback);
    }

    process.stderr.write(line + '\n');
  }
}

/**
 * Default logger for engine runs. Debug output is disabled; callers that
 * need it construct their own Logger from configuration.
 */
export const logger = new Logger({ component: 'DocSchema', debugMode: false });
