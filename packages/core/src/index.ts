/**
 * Observable values, combine-latest derivation and
 * render bindings.
 *
 * @example
 * ```ts
 * import { Binding, ObservableValue, combine2 } from '@watchable/core';
 *
 * const first = new ObservableValue('Ada');
 * const last = new ObservableValue('Lovelace');
 * const fullName = combine2(first, last, (f, l) => `${f} ${l}`);
 *
 * const binding = new Binding<string>({ onRebuild: (name) => render(name) });
 * binding.attach(fullName); // renders "Ada Lovelace"
 * last.value = 'Byron';     // renders "Ada Byron"
 * binding.detach();
 * ```
 *
 * @module @watchable/core
 */

// Errors
export * from './errors/index.js';

// Equality
export * from './equality/index.js';

// Configuration
export * from './config/index.js';

// Observable values and derivations
export * from './observable/index.js';

// Bindings
export * from './binding/index.js';

// Observability
export * from './observability/index.js';
