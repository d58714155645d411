/**
 * Fixed-arity combine helpers.
 *
 * Each helper builds a single {@link CombinedObservable} whose combiner reads
 * its typed sources by position, so sources of different types combine
 * without casts.
 *
 * @example
 * ```typescript
 * const email = new ObservableValue('');
 * const password = new ObservableValue('');
 * const canSubmit = combine2(email, password, (e, p) => e.includes('@') && p.length >= 8);
 * ```
 *
 * @module observable/combine
 */

import {
  type CombinedObservableOptions,
  CombinedObservable,
} from './combined-observable.js';
import type { ReadonlyObservable } from './observable.js';

/**
 * Combine a homogeneous list of sources.
 */
export function combineAll<T, R>(
  sources: readonly ReadonlyObservable<T>[],
  combiner: (values: readonly T[]) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<T, R> {
  return new CombinedObservable(sources, combiner, options);
}

export function combine2<A, B, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  combiner: (a: A, b: B) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<unknown, R> {
  return new CombinedObservable<unknown, R>([a, b], () => combiner(a.read(), b.read()), options);
}

export function combine3<A, B, C, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  combiner: (a: A, b: B, c: C) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<unknown, R> {
  return new CombinedObservable<unknown, R>(
    [a, b, c],
    () => combiner(a.read(), b.read(), c.read()),
    options
  );
}

export function combine4<A, B, C, D, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  combiner: (a: A, b: B, c: C, d: D) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<unknown, R> {
  return new CombinedObservable<unknown, R>(
    [a, b, c, d],
    () => combiner(a.read(), b.read(), c.read(), d.read()),
    options
  );
}

export function combine5<A, B, C, D, E, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  e: ReadonlyObservable<E>,
  combiner: (a: A, b: B, c: C, d: D, e: E) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<unknown, R> {
  return new CombinedObservable<unknown, R>(
    [a, b, c, d, e],
    () => combiner(a.read(), b.read(), c.read(), d.read(), e.read()),
    options
  );
}

export function combine6<A, B, C, D, E, F, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  e: ReadonlyObservable<E>,
  f: ReadonlyObservable<F>,
  combiner: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<unknown, R> {
  return new CombinedObservable<unknown, R>(
    [a, b, c, d, e, f],
    () => combiner(a.read(), b.read(), c.read(), d.read(), e.read(), f.read()),
    options
  );
}
