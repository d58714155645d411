/**
 * Watchable Error System
 *
 * Structured, synchronous errors with codes, categories and suggestions.
 *
 * @example
 * ```typescript
 * import { WatchError } from '@watchable/core';
 *
 * try {
 *   source.value = 3; // a combiner downstream throws
 * } catch (error) {
 *   if (WatchError.isCategory(error, 'derivation')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  WatchError,
  ensureWatchError,
  type SerializedWatchError,
  type WatchErrorOptions,
} from './watch-error.js';
