/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that stdout stays free for
 * generated header text.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, suppressed unless debug mode is on
 * - `info`: normal operation
 * - `warn`: something looks off but generation continues
 * - `error`: generation failed
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry as serialized to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "generate-config-h"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "header_written"
   */
  readonly event: string;

  /** Additional JSON-serializable context. */
  readonly data?: Record<string, unknown>;
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

  /**
   * Suppresses `debug` and `info` entries. Warnings and errors are still written.
   * @defaultValue false
   */
  readonly quiet?: boolean;

  /**
   * Sink for serialized lines.
   * @defaultValue process.stderr
   */
  readonly stream?: Pick<NodeJS.WritableStream, 'write'>;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'generate-config-h', debugMode: true });
 * logger.info('header_written', { path: 'build/info_config.h' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly quiet: boolean;
  private readonly stream: Pick<NodeJS.WritableStream, 'write'> | undefined;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.quiet = options.quiet ?? false;
    this.stream = options.stream;
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode || this.quiet) {
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
    if (this.quiet) {
      return;
    }
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

  /**
   * Returns a logger for a sub-component sharing this logger's settings.
   *
   * @param component - Name of the sub-component.
   */
  child(component: string): Logger {
    return new Logger({
      component: `${this.component}:${component}`,
      debugMode: this.debugMode,
      quiet: this.quiet,
      ...(this.stream !== undefined ? { stream: this.stream } : {}),
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    (this.stream ?? process.stderr).write(serializeEntry(entry) + '\n');
  }
}

function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    // cycles and BigInt land here; keep the envelope, drop the payload
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

