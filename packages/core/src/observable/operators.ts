/**
 * Derived single-source observables.
 *
 * @module observable/operators
 */

import type { Subscription } from 'rxjs';
import { getLogger } from '../config/watch-config.js';
import type { Equality, EqualityStrategy } from '../equality/equality.js';
import {
  type CombinedObservableOptions,
  CombinedObservable,
  runDerivation,
} from './combined-observable.js';
import {
  ObservableValue,
  type ObservableValueOptions,
  type ReadonlyObservable,
} from './observable.js';

/**
 * Derive a value by applying `mapper` to the source's value.
 *
 * @example
 * ```typescript
 * const celsius = new ObservableValue(20);
 * const fahrenheit = mapValue(celsius, (c) => (c * 9) / 5 + 32);
 * ```
 */
export function mapValue<T, R>(
  source: ReadonlyObservable<T>,
  mapper: (value: T) => R,
  options?: CombinedObservableOptions<R>
): CombinedObservable<T, R> {
  return new CombinedObservable<T, R>([source], () => mapper(source.read()), options);
}

/**
 * Follow the source under a different equality.
 *
 * Notifications the custom equality considers equal to the last value
 * passed on are dropped.
 *
 * @example
 * ```typescript
 * const user = new ObservableValue({ id: 1, lastSeen: 0 });
 * const sameUser = distinctValue(user, (a, b) => a.id === b.id);
 * ```
 */
export function distinctValue<T>(
  source: ReadonlyObservable<T>,
  equals: EqualityStrategy | Equality<T>,
  options?: Omit<CombinedObservableOptions<T>, 'equals'>
): CombinedObservable<T, T> {
  return new CombinedObservable<T, T>([source], () => source.read(), { ...options, equals });
}

/**
 * An observable that starts at its source's value and afterwards only
 * follows source values that satisfy a predicate.
 */
export class FilteredObservable<T> extends ObservableValue<T> {
  readonly source: ReadonlyObservable<T>;

  private readonly predicate: (value: T) => boolean;
  private upstream: Subscription | null;

  constructor(
    source: ReadonlyObservable<T>,
    predicate: (value: T) => boolean,
    options: ObservableValueOptions<T> = {}
  ) {
    super(source.read(), { ...options, logger: options.logger ?? getLogger('filtered') });
    this.source = source;
    this.predicate = predicate;
    this.upstream = source.subscribe(() => this.follow());
  }

  get isConnected(): boolean {
    return this.upstream !== null;
  }

  override dispose(): void {
    this.upstream?.unsubscribe();
    this.upstream = null;
    super.dispose();
  }

  private follow(): void {
    const candidate = this.source.read();
    const accepted = runDerivation(() => this.predicate(candidate), this.logger, {
      name: this.name,
    });
    if (accepted) {
      this.write(candidate);
    }
  }
}

/**
 * Follow only the source values that satisfy `predicate`.
 *
 * @example
 * ```typescript
 * const input = new ObservableValue(5);
 * const positive = filterValue(input, (n) => n > 0);
 * input.value = -1; // positive stays 5
 * ```
 */
export function filterValue<T>(
  source: ReadonlyObservable<T>,
  predicate: (value: T) => boolean,
  options?: ObservableValueOptions<T>
): FilteredObservable<T> {
  return new FilteredObservable(source, predicate, options);
}
