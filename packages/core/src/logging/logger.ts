/**
 * Structured logger with pluggable transports
 */

import type { LogEntry, LogLevel, LogTransport, LoggerConfig } from './types.js';
import { LOG_LEVELS } from './types.js';

/**
 * In-memory transport for tests and diagnostics
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';
  private entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Console transport, one line per entry
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  write(entry: LogEntry): void {
    const prefix = this.getLevelPrefix(entry.level);
    const context = entry.context && Object.keys(entry.context).length > 0
      ? ` ${JSON.stringify(entry.context)}`
      : '';
    console.log(`${prefix} [${entry.component}] ${entry.message}${context}`);
  }

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case 'error': return '\x1b[31m[ERROR]\x1b[0m';
      case 'warning': return '\x1b[33m[WARNING]\x1b[0m';
      case 'info': return '\x1b[34m[INFO]\x1b[0m';
      case 'debug': return '\x1b[90m[DEBUG]\x1b[0m';
    }
  }
}

/**
 * Logger class. Child loggers share their parent's transports.
 */
export class Logger {
  private readonly transports: LogTransport[];
  private readonly minLevel: LogLevel;
  private readonly component: string;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.minLevel ?? 'info';
    this.component = config.component ?? 'lumora';
    this.transports = config.transports ?? [];
  }

  /**
   * Add a transport to the logger
   */
  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Remove a transport by name
   */
  removeTransport(name: string): boolean {
    const index = this.transports.findIndex((t) => t.name === name);
    if (index >= 0) {
      this.transports.splice(index, 1);
      return true;
    }
    return false;
  }

  /**
   * Logger for a sub-component, writing to the same transports
   */
  child(component: string): Logger {
    return new Logger({
      minLevel: this.minLevel,
      component,
      transports: this.transports,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      context,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (error) {
        console.error(`[Logger] Transport ${transport.name} failed:`, error);
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }
}

/**
 * Create a logger writing to the console
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger({
    ...config,
    transports: config.transports ?? [new ConsoleTransport()],
  });
}

/**
 * Create a logger with no transports
 */
export function createSilentLogger(): Logger {
  return new Logger({ transports: [] });
}

/**
 * Create a logger backed by a memory transport, for tests
 */
export function createTestLogger(minLevel: LogLevel = 'debug'): {
  logger: Logger;
  transport: MemoryTransport;
} {
  const transport = new MemoryTransport();
  return { logger: new Logger({ minLevel, transports: [transport] }), transport };
}
