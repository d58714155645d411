/**
 * React hooks for values combined from several observables.
 *
 * @module hooks/use-combine
 */

import {
  CombinedObservable,
  type Equality,
  type EqualityStrategy,
  ObservableValue,
  type ReadonlyObservable,
  type ShouldRebuild,
  WatchError,
} from '@watchable/core';
import { useEffect, useMemo, useRef, useState } from 'react';
import { useWatch } from './use-watch.js';

/**
 * Configuration options for {@link useCombine} and its fixed-arity siblings.
 */
export interface UseCombineOptions<R> {
  /** Equality for the combined value, read when the combination is created */
  equals?: EqualityStrategy | Equality<R>;
  /** Re-render predicate, see {@link useWatch} */
  shouldRebuild?: ShouldRebuild<R>;
}

type AnySource = ReadonlyObservable<unknown>;

function sameSources(a: readonly AnySource[], b: readonly AnySource[]) {
  return a.length === b.length && a.every((source, index) => source === b[index]);
}

/**
 * Keep the same array instance while the listed observables are unchanged,
 * so inline arrays do not recreate the combination on every render.
 */
function useStableSources(sources: readonly AnySource[]) {
  const ref = useRef(sources);
  if (!sameSources(ref.current, sources)) {
    ref.current = sources;
  }
  return ref.current;
}

interface Connected<R> {
  readonly sources: readonly AnySource[];
  readonly observable: CombinedObservable<unknown, R>;
}

/**
 * Own a {@link CombinedObservable} over `sources` for the component's
 * lifetime. `compute` reads the sources itself; the latest one passed is
 * used on each recombination.
 */
function useCombination<R>(
  sources: readonly AnySource[],
  compute: () => R,
  options: UseCombineOptions<R>
): R {
  const { equals, shouldRebuild } = options;
  const stableSources = useStableSources(sources);

  const computeRef = useRef(compute);
  computeRef.current = compute;

  const [connected, setConnected] = useState<Connected<R> | null>(null);

  // Stands in for the combination until the effect has created it
  const placeholder = useMemo(() => {
    if (stableSources.length === 0) {
      throw new WatchError({ code: 'WATCH_C100', context: { sources: 0 } });
    }
    return new ObservableValue(computeRef.current(), { equals });
  }, [stableSources]);

  useEffect(() => {
    const observable = new CombinedObservable<unknown, R>(
      stableSources,
      () => computeRef.current(),
      { equals }
    );
    setConnected({ sources: stableSources, observable });
    return () => {
      observable.dispose();
    };
  }, [stableSources]);

  const target =
    connected && connected.sources === stableSources ? connected.observable : placeholder;

  return useWatch<R>(target, { shouldRebuild });
}

/**
 * React hook combining a list of observables of one type into one value.
 *
 * The {@link CombinedObservable} is created in an effect and disposed when
 * the sources change or the component unmounts. Until it exists the hook
 * renders the combination of the sources' current values. The latest
 * `combiner` is used on the next recombination.
 *
 * @throws {@link WatchError} `WATCH_C100` when `sources` is empty
 *
 * @example
 * ```tsx
 * function Total({ prices }: { prices: ReadonlyObservable<number>[] }) {
 *   const total = useCombine(prices, (values) => values.reduce((a, b) => a + b, 0));
 *   return <strong>{total}</strong>;
 * }
 * ```
 */
export function useCombine<T, R>(
  sources: readonly ReadonlyObservable<T>[],
  combiner: (values: readonly T[]) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination(sources, () => combiner(sources.map((source) => source.read())), options);
}

/**
 * Combine two observables of different types; see {@link useCombine} for
 * the lifecycle.
 *
 * @example
 * ```tsx
 * function SubmitButton({ email, password }: Props) {
 *   const canSubmit = useCombine2(email, password, (e, p) => e.includes('@') && p.length >= 8);
 *   return <button disabled={!canSubmit}>Sign in</button>;
 * }
 * ```
 */
export function useCombine2<A, B, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  combiner: (a: A, b: B) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination([a, b], () => combiner(a.read(), b.read()), options);
}

export function useCombine3<A, B, C, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  combiner: (a: A, b: B, c: C) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination([a, b, c], () => combiner(a.read(), b.read(), c.read()), options);
}

export function useCombine4<A, B, C, D, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  combiner: (a: A, b: B, c: C, d: D) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination(
    [a, b, c, d],
    () => combiner(a.read(), b.read(), c.read(), d.read()),
    options
  );
}

export function useCombine5<A, B, C, D, E, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  e: ReadonlyObservable<E>,
  combiner: (a: A, b: B, c: C, d: D, e: E) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination(
    [a, b, c, d, e],
    () => combiner(a.read(), b.read(), c.read(), d.read(), e.read()),
    options
  );
}

export function useCombine6<A, B, C, D, E, F, R>(
  a: ReadonlyObservable<A>,
  b: ReadonlyObservable<B>,
  c: ReadonlyObservable<C>,
  d: ReadonlyObservable<D>,
  e: ReadonlyObservable<E>,
  f: ReadonlyObservable<F>,
  combiner: (a: A, b: B, c: C, d: D, e: E, f: F) => R,
  options: UseCombineOptions<R> = {}
): R {
  return useCombination(
    [a, b, c, d, e, f],
    () => combiner(a.read(), b.read(), c.read(), d.read(), e.read(), f.read()),
    options
  );
}
