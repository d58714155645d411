/**
 * React hook that keeps a component in sync with one observable.
 *
 * @module hooks/use-watch
 */

import { Binding, type ReadonlyObservable, type ShouldRebuild, defaultShouldRebuild } from '@watchable/core';
import { useEffect, useRef, useState } from 'react';

/**
 * Configuration options for {@link useWatch}.
 */
export interface UseWatchOptions<T> {
  /**
   * Re-render predicate. Receives the value seen by the previous
   * notification and the current one. The latest function passed is used
   * without resubscribing.
   */
  shouldRebuild?: ShouldRebuild<T>;
  /** Debug name for the underlying binding */
  name?: string;
}

interface Rendered<T> {
  readonly source: ReadonlyObservable<T>;
  readonly value: T;
}

/**
 * React hook returning the current value of an observable and re-rendering
 * the component when it changes.
 *
 * Passing a different observable swaps the subscription: the render that
 * sees the new observable already returns its current value, and later
 * writes to the old one are ignored.
 *
 * @example
 * ```tsx
 * function CartBadge({ cart }: { cart: ReadonlyObservable<Item[]> }) {
 *   const items = useWatch(cart);
 *   return <span className="badge">{items.length}</span>;
 * }
 *
 * // Re-render only when the count crosses a threshold
 * function Warning({ count }: { count: ReadonlyObservable<number> }) {
 *   const value = useWatch(count, {
 *     shouldRebuild: (previous, current) => previous < 10 !== current < 10,
 *   });
 *   return value >= 10 ? <p>Too many</p> : null;
 * }
 * ```
 */
export function useWatch<T>(observable: ReadonlyObservable<T>, options: UseWatchOptions<T> = {}): T {
  const { shouldRebuild, name } = options;

  const shouldRebuildRef = useRef(shouldRebuild);
  shouldRebuildRef.current = shouldRebuild;

  const [rendered, setRendered] = useState<Rendered<T>>(() => ({
    source: observable,
    value: observable.read(),
  }));

  const bindingRef = useRef<Binding<T> | null>(null);

  useEffect(() => {
    if (!bindingRef.current) {
      bindingRef.current = new Binding<T>({
        name,
        shouldRebuild: (previous, current, target) =>
          (shouldRebuildRef.current ?? defaultShouldRebuild)(previous, current, target),
        onRebuild: (value, { target, reason }) => {
          if (reason === 'change') {
            // a fresh state object, so a refresh of the same reference re-renders
            setRendered({ source: target, value });
            return;
          }
          setRendered((prev) =>
            prev.source === target && Object.is(prev.value, value) ? prev : { source: target, value }
          );
        },
      });
    }
    bindingRef.current.attach(observable);
  }, [observable]);

  useEffect(() => {
    return () => {
      bindingRef.current?.detach();
    };
  }, []);

  return rendered.source === observable ? rendered.value : observable.read();
}
