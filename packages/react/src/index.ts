/**
 * React bindings for @watchable/core.
 *
 * Components read observables through hooks that attach a {@link Binding}
 * after mount, detach it on unmount and swap it when a different observable
 * is passed.
 *
 * ```tsx
 * import { ObservableValue, increment } from '@watchable/core';
 * import { useWatch } from '@watchable/react';
 *
 * const clicks = new ObservableValue(0);
 *
 * function Clicker() {
 *   const count = useWatch(clicks);
 *   return <button onClick={() => increment(clicks)}>{count}</button>;
 * }
 * ```
 *
 * - {@link useWatch} - value of one observable
 * - {@link useCombine}, {@link useCombine2} … {@link useCombine6} - value combined from several observables
 * - {@link useWatchable} - component-owned observable
 * - {@link Watch} / {@link WatchCombined} - render-prop components
 *
 * @packageDocumentation
 * @module @watchable/react
 */

export * from './components/index.js';
export * from './hooks/index.js';
