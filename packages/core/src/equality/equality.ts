/**
 * Equality strategies used to decide whether a write is a change.
 *
 * @module equality
 */

/** Decides whether two values are the same for notification purposes. */
export type Equality<T> = (a: T, b: T) => boolean;

/** Named built-in strategies. */
export type EqualityStrategy = 'structural' | 'identity' | 'shallow';

/**
 * Identity comparison (`Object.is`). Use for opaque handles and for values
 * that are mutated in place and should only count as changed on reassignment.
 */
export function identical(a: unknown, b: unknown): boolean {
  return Object.is(a, b);
}

function isObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/** Pairs of objects already under deep comparison, keyed by the left side */
type Visited = WeakMap<object, WeakSet<object>>;

function compare(a: unknown, b: unknown, deep: boolean, visited?: Visited): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'number') return sameNumber(a, b);
  if (!isObjectLike(a) || !isObjectLike(b)) return false;
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

  let inner: (x: unknown, y: unknown) => boolean = identical;
  if (deep) {
    // A pair met again while still being compared closes a cycle; the
    // comparison in progress decides it.
    const seen: Visited = visited ?? new WeakMap();
    let partners = seen.get(a);
    if (partners?.has(b)) return true;
    if (!partners) {
      partners = new WeakSet();
      seen.set(a, partners);
    }
    partners.add(b);
    inner = (x, y) => compare(x, y, true, seen);
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (a instanceof RegExp && b instanceof RegExp) {
    return a.toString() === b.toString();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => inner(item, b[index]));
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !inner(value, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    for (const member of a) {
      if (!b.has(member)) return false;
    }
    return true;
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => Object.hasOwn(b, key) && inner(a[key], b[key]));
}

/**
 * Recursive structural equality.
 *
 * Supports primitives (NaN equals NaN), `Date`, `RegExp`, arrays, `Map`,
 * `Set` (membership by identity) and objects sharing a prototype, compared
 * over own enumerable keys. Cyclic structures compare by shape: a pair
 * reached again through a cycle counts as equal.
 *
 * @example
 * ```typescript
 * structuralEquals({ tags: ['a'] }, { tags: ['a'] }); // true
 * structuralEquals(new Map([[1, 'x']]), new Map([[1, 'y']])); // false
 * ```
 */
export function structuralEquals(a: unknown, b: unknown): boolean {
  return compare(a, b, true);
}

/**
 * One-level structural equality: containers are compared element by element,
 * elements by identity.
 */
export function shallowEquals(a: unknown, b: unknown): boolean {
  return compare(a, b, false);
}

const STRATEGIES: Record<EqualityStrategy, Equality<unknown>> = {
  structural: structuralEquals,
  identity: identical,
  shallow: shallowEquals,
};

/** Resolve a named strategy or custom function into an {@link Equality}. */
export function resolveEquality<T>(strategy: EqualityStrategy | Equality<T>): Equality<T> {
  return typeof strategy === 'function' ? strategy : STRATEGIES[strategy];
}
