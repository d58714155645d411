/**
 * Render-prop components over {@link useWatch} and {@link useCombine}.
 *
 * @module components/watch
 */

import type { ReadonlyObservable, ShouldRebuild } from '@watchable/core';
import type { ReactElement, ReactNode } from 'react';
import { useCombine } from '../hooks/use-combine.js';
import { useWatch } from '../hooks/use-watch.js';

export interface WatchProps<T> {
  observable: ReadonlyObservable<T>;
  render: (value: T) => ReactNode;
  shouldRebuild?: ShouldRebuild<T>;
}

/**
 * Re-renders `render` with the observable's value; the parent does not
 * re-render.
 *
 * @example
 * ```tsx
 * <Watch observable={user} render={(u) => <h1>Hello {u.name}</h1>} />
 * ```
 */
export function Watch<T>({ observable, render, shouldRebuild }: WatchProps<T>): ReactElement {
  const value = useWatch(observable, { shouldRebuild });
  return <>{render(value)}</>;
}

export interface WatchCombinedProps<T, R> {
  sources: readonly ReadonlyObservable<T>[];
  combiner: (values: readonly T[]) => R;
  render: (value: R) => ReactNode;
  shouldRebuild?: ShouldRebuild<R>;
}

export function WatchCombined<T, R>({
  sources,
  combiner,
  render,
  shouldRebuild,
}: WatchCombinedProps<T, R>): ReactElement {
  const value = useCombine(sources, combiner, { shouldRebuild });
  return <>{render(value)}</>;
}
