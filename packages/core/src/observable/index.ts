/**
 * Observable values and derivations.
 *
 * - {@link ObservableValue}: mutable value with equality-gated notification
 * - {@link CombinedObservable}: combine-latest over a list of sources
 * - {@link combine2} … {@link combine6}: typed fixed-arity combination
 * - {@link mapValue}, {@link filterValue}, {@link distinctValue}: single-source derivations
 * - Immutable-update helpers ({@link increment}, {@link toggle}, {@link pushItem}, …)
 *
 * ## Propagation
 *
 * ```
 *  write(a) ──► listeners of a (registration order)
 *                  │
 *                  ├─► CombinedObservable.recompute ──► write(combined)
 *                  │                                       │
 *                  │                                       └─► Binding ──► render
 *                  └─► next listener of a
 * ```
 *
 * Every wave is synchronous and depth-first: by the time `write` returns,
 * every dependent value and binding has settled.
 *
 * @module observable
 */

export {
  ObservableValue,
  type Listener,
  type ObservableValueOptions,
  type ReadonlyObservable,
} from './observable.js';

export {
  CombinedObservable,
  type CombinedObservableOptions,
  type Combiner,
} from './combined-observable.js';

export { combine2, combine3, combine4, combine5, combine6, combineAll } from './combine.js';

export { FilteredObservable, distinctValue, filterValue, mapValue } from './operators.js';

export {
  absValue,
  addMember,
  addMembers,
  appendText,
  clampValue,
  clearEntries,
  clearItems,
  clearMembers,
  clearText,
  decrement,
  deleteEntry,
  deleteMember,
  increment,
  insertItem,
  lowerCaseText,
  maxLengthText,
  pushAll,
  pushItem,
  rangedValue,
  removeItem,
  removeItemAt,
  setEntries,
  setEntry,
  setFalse,
  setTrue,
  toggle,
  toggleFlag,
  trimText,
  truncateText,
  upperCaseText,
} from './helpers.js';
