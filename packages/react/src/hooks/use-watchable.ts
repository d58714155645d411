/**
 * @module hooks/use-watchable
 */

import { ObservableValue, type ObservableValueOptions } from '@watchable/core';
import { useState } from 'react';
import { useWatch } from './use-watch.js';

/**
 * React hook creating an {@link ObservableValue} owned by the component.
 *
 * The observable is created on the first render and kept for the lifetime
 * of the component. Bindings attached by this hook are detached on unmount;
 * the observable itself is left usable for any code still holding it.
 *
 * @returns The current value and the observable to write to
 *
 * @example
 * ```tsx
 * function Toggle() {
 *   const [open, state] = useWatchable(false);
 *   return <button onClick={() => toggle(state)}>{open ? 'Close' : 'Open'}</button>;
 * }
 * ```
 */
export function useWatchable<T>(
  initial: T,
  options?: ObservableValueOptions<T>
): [T, ObservableValue<T>] {
  const [observable] = useState(() => new ObservableValue(initial, options));
  const value = useWatch(observable);
  return [value, observable];
}
