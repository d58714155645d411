/**
 * Structured logging for watchable values.
 *
 * Provides a lightweight, zero-dependency structured logger with levels,
 * module prefixes and a global debug mode toggle. Entries go to a handler;
 * without one the logger is silent.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface WatchLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Receives every emitted entry (default: none, entries are dropped) */
  readonly handler?: (entry: LogEntry) => void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all watchable loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@watchable/core';
 *
 * const log = createLogger({ module: 'cart', level: 'debug', handler: (e) => sink.push(e) });
 *
 * log.debug('write accepted', { name: 'total', listeners: 2 });
 * log.child('binding').warn('slow render', { ms: 40 });
 * ```
 */
export class WatchLogger {
  private readonly config: Required<Omit<WatchLoggerConfig, 'handler'>> &
    Pick<WatchLoggerConfig, 'handler'>;

  constructor(config: WatchLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'watchable',
      handler: config.handler,
    };
  }

  /** Module name, including parent prefixes */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): WatchLogger {
    return new WatchLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Whether an entry at `level` would currently be emitted */
  isEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
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
    this.log('error', message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    this.config.handler?.(entry);
  }
}

/** Factory function to create a WatchLogger */
export function createLogger(config?: WatchLoggerConfig): WatchLogger {
  return new WatchLogger(config);
}
