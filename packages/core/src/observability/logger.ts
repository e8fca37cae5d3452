/**
 * Structured logging for Docket.
 *
 * Levels, child loggers per module, bound context, and a global debug
 * toggle. Loggers stay silent until given a handler or an output format.
 *
 * @module observability/logger
 */

import { DocketError } from '../errors/docket-error.js';

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Console output format */
export type LogFormat = 'json' | 'text';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly error?: { message: string; code?: string; stack?: string };
}

/** Logger configuration */
export interface DocketLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Shorthand for `level: 'debug'` */
  readonly debug?: boolean;
  /** Module name (default: 'docket') */
  readonly module?: string;
  /** Receives every entry at or above the level; replaces console output */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console in this format */
  readonly format?: LogFormat;
  /** Fields merged into the context of every entry */
  readonly context?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Turn debug output on or off for every Docket logger */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

function describeError(error: Error): NonNullable<LogEntry['error']> {
  return {
    message: error.message,
    ...(DocketError.isDocketError(error) ? { code: error.code } : {}),
    ...(error.stack ? { stack: error.stack } : {}),
  };
}

/**
 * Render an entry as one line of text
 *
 * @example
 * ```typescript
 * formatText(entry); // '2024-01-01T00:00:00.000Z WARN [docket:users] insert rejected {"errors":2}'
 * ```
 */
export function formatText(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString();
  const parts = [time, entry.level.toUpperCase(), `[${entry.module}]`, entry.message];
  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }
  if (entry.error) {
    parts.push(entry.error.code ? `(${entry.error.code}) ${entry.error.message}` : entry.error.message);
  }
  return parts.join(' ');
}

/**
 * Structured logger for Docket modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@docket/core';
 *
 * const log = createLogger({ module: 'app', level: 'debug', format: 'text' });
 * const users = log.child('users', { collection: 'users' });
 *
 * users.info('Seeded', { count: 3 });
 *
 * const end = users.time('findOne');
 * // ... do work ...
 * end({ found: true }); // logs "findOne completed" with durationMs
 * ```
 */
export class DocketLogger {
  private readonly level: LogLevel;
  private readonly module: string;
  private readonly handler: ((entry: LogEntry) => void) | undefined;
  private readonly format: LogFormat | undefined;
  private readonly bound: Record<string, unknown>;

  constructor(config: DocketLoggerConfig = {}) {
    this.level = config.debug ? 'debug' : (config.level ?? 'info');
    this.module = config.module ?? 'docket';
    this.handler = config.handler;
    this.format = config.format;
    this.bound = config.context ?? {};
  }

  get moduleName(): string {
    return this.module;
  }

  /** Create a child logger with a sub-module suffix and extra bound context */
  child(subModule: string, context?: Record<string, unknown>): DocketLogger {
    return new DocketLogger({
      level: this.level,
      module: `${this.module}:${subModule}`,
      handler: this.handler,
      format: this.format,
      context: { ...this.bound, ...context },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    const effective = globalDebug ? 'debug' : this.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effective];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Start a timer. The returned function logs `<operation> completed` at
   * debug level and returns the elapsed milliseconds.
   */
  time(operation: string): (context?: Record<string, unknown>) => number {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
      return durationMs;
    };
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;
    if (!this.handler && !this.format) return;

    const merged = { ...this.bound, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
      ...(error ? { error: describeError(error) } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    const line = this.format === 'json' ? JSON.stringify(entry) : formatText(entry);
    const consoleFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    consoleFn(line);
  }
}

export function createLogger(config?: DocketLoggerConfig): DocketLogger {
  return new DocketLogger(config);
}
