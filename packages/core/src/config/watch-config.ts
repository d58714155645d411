/**
 * Global defaults for observables created after configuration.
 *
 * @module config
 */

import type { EqualityStrategy } from '../equality/equality.js';
import {
  type LogEntry,
  type LogLevel,
  type WatchLogger,
  createLogger,
  setDebugMode,
} from '../observability/logger.js';

export interface WatchConfig {
  /** Equality used by observables that do not pass `equals` (default: 'structural') */
  readonly equality: EqualityStrategy;
  /** Global debug logging (default: false) */
  readonly debug: boolean;
  /** Minimum level for library logs (default: 'warn') */
  readonly logLevel: LogLevel;
  /** Receives library log entries; without one, logs are dropped */
  readonly logHandler?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: WatchConfig = Object.freeze({
  equality: 'structural',
  debug: false,
  logLevel: 'warn',
});

let currentConfig: WatchConfig = DEFAULT_CONFIG;
let rootLogger: WatchLogger = buildLogger(currentConfig);

function buildLogger(config: WatchConfig): WatchLogger {
  return createLogger({
    module: 'watchable',
    level: config.logLevel,
    handler: config.logHandler,
  });
}

/**
 * Merge `patch` into the global configuration.
 *
 * Only observables and bindings constructed afterwards pick up the new
 * equality and logger; existing instances keep what they resolved.
 *
 * @example
 * ```typescript
 * configureWatch({ equality: 'identity', logLevel: 'debug', logHandler: (e) => entries.push(e) });
 * ```
 */
export function configureWatch(patch: Partial<WatchConfig>): WatchConfig {
  currentConfig = Object.freeze({ ...currentConfig, ...patch });
  setDebugMode(currentConfig.debug);
  rootLogger = buildLogger(currentConfig);
  return currentConfig;
}

export function getWatchConfig(): WatchConfig {
  return currentConfig;
}

/** Restore the defaults and turn global debug mode off. */
export function resetWatchConfig(): WatchConfig {
  return configureWatch({ ...DEFAULT_CONFIG, logHandler: undefined });
}

/** Logger for a library module, derived from the current configuration. */
export function getLogger(module: string): WatchLogger {
  return rootLogger.child(module);
}
