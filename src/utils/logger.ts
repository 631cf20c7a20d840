/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr. Used to emit resolution
 * diagnostics and engine debug events.
 *
 * @packageDocumentation
 */

import type { Diagnostic, Severity } from '../resolution/diagnostics.js';

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ResolutionEngine"
   */
  readonly component: string;

  /**
   * Brief snake_case description of the logged event.
   * @example "config_document_merged"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

const SEVERITY_LEVELS: Readonly<Record<Severity, LogLevel>> = {
  info: 'info',
  warning: 'warn',
  error: 'error',
};

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ResolutionEngine', debugMode: true });
 * logger.debug('resolution_started', { tokens: 3 });
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
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
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

  /**
   * Writes a resolution diagnostic as a `diagnostic` event at the matching level.
   *
   * @param diagnostic - The record to write.
   */
  diagnostic(diagnostic: Diagnostic): void {
    this.log(SEVERITY_LEVELS[diagnostic.severity], 'diagnostic', {
      subject: diagnostic.subject,
      message: diagnostic.message,
    });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and bigints cannot be serialized; keep the envelope.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}

/**
 * Default logger instance.
 *
 * Debug output is enabled by setting `TIERCONF_DEBUG=1`.
 */
export const logger = new Logger({
  component: 'tierconf',
  debugMode: process.env.TIERCONF_DEBUG === '1',
});
