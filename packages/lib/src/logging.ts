/**
 * Structured JSON Logger
 *
 * Base class for the per-module loggers. Subclasses add typed event methods
 * and call `log()` with their own event names.
 *
 * @module logging
 */

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Include timestamps in output */
  includeTimestamp: boolean;

  /** Pretty print JSON (development only) */
  prettyPrint: boolean;

  /** Custom output function (defaults to console.log) */
  output?: (message: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL),
  includeTimestamp: true,
  prettyPrint: process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test',
};

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

/** Shape of every emitted entry */
export interface LogEntry {
  event: string;
  level: LogLevel;
  module: string;
  timestamp?: string;
  session_id?: string;
  [key: string]: unknown;
}

// ===========================================
// Logger Class
// ===========================================

export class StructuredLogger<TEvent extends string = string> {
  protected config: LoggerConfig;
  private sessionId?: string;

  constructor(
    protected readonly moduleName: string,
    config: Partial<LoggerConfig> = {}
  ) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  /**
   * Set session ID for all subsequent log entries
   */
  setSessionId(sessionId: string): void {
    this.sessionId = sessionId;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  /**
   * Format and output log entry
   */
  protected log(
    level: LogLevel,
    event: TEvent | 'message',
    data: Record<string, unknown>
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      event,
      level,
      module: this.moduleName,
      timestamp: this.config.includeTimestamp ? new Date().toISOString() : undefined,
      session_id: this.sessionId,
      ...data,
    };

    // Remove undefined values
    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.config.output ?? console.log;
    const message = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    output(message);
  }

  // ===========================================
  // Generic Methods
  // ===========================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', 'message', { message, ...data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', 'message', { message, ...data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', 'message', { message, ...data });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', 'message', { message, ...data });
  }
}
