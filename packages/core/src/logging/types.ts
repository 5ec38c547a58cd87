/**
 * Logger types
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

/**
 * Numeric ordering of log levels
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  /** Component tag, e.g. "QueryExecutor" */
  component: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Destination for log entries
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Entries below this level are dropped (default: info) */
  minLevel?: LogLevel;
  /** Component tag applied to every entry */
  component?: string;
  /** Initial transports */
  transports?: LogTransport[];
}
