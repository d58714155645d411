/**
 * Watchable Error Codes
 *
 * Error codes are structured as WATCH_[CATEGORY][NUMBER]:
 * - C: Construction errors (C100-C199)
 * - L: Lifecycle errors (L200-L299)
 * - D: Derivation errors (D300-D399)
 * - A: Argument errors (A400-A499)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Construction errors (C100-C199)
  WATCH_C100: {
    code: 'WATCH_C100',
    message: 'Combined observable requires at least one source',
    suggestion: 'Pass a non-empty list of sources. A constant value does not need combining.',
  },

  // Lifecycle errors (L200-L299)
  WATCH_L200: {
    code: 'WATCH_L200',
    message: 'Observable has been disposed',
    suggestion: 'Create a new observable instead of subscribing to one that was disposed.',
  },
  WATCH_L201: {
    code: 'WATCH_L201',
    message: 'Binding has been disposed',
    suggestion: 'Create a new Binding; a disposed binding cannot be attached again.',
  },

  // Derivation errors (D300-D399)
  WATCH_D300: {
    code: 'WATCH_D300',
    message: 'Derivation function failed',
    suggestion:
      'A combiner, mapper or predicate threw while recomputing a derived value. See the cause for details.',
  },

  // Argument errors (A400-A499)
  WATCH_A400: {
    code: 'WATCH_A400',
    message: 'Invalid argument',
    suggestion: 'Check the argument against the documented range for this helper.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'construction' | 'lifecycle' | 'derivation' | 'argument';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(6);
  switch (letter) {
    case 'C':
      return 'construction';
    case 'L':
      return 'lifecycle';
    case 'D':
      return 'derivation';
    default:
      return 'argument';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
