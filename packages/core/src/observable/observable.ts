import { Observable, Subject, Subscription } from 'rxjs';
import { getLogger, getWatchConfig } from '../config/watch-config.js';
import { type Equality, type EqualityStrategy, resolveEquality } from '../equality/equality.js';
import { WatchError } from '../errors/watch-error.js';
import type { WatchLogger } from '../observability/logger.js';

/**
 * Callback invoked for every accepted write.
 *
 * `value` is the value written by the wave that invoked the listener. When a
 * listener earlier in the same wave writes again, `value` can lag behind
 * the observable's current value; read `observable.value` when the latest
 * value matters.
 */
export type Listener<T> = (value: T, previous: T) => void;

/**
 * The read-and-listen surface of an observable value.
 *
 * Bindings, combiners and operators depend on this interface only, so any
 * derived value can stand in for a plain {@link ObservableValue}.
 */
export interface ReadonlyObservable<T> {
  /** Debug name, used in logs and error context */
  readonly name: string | undefined;
  /** Current value */
  readonly value: T;
  /** Current value; same as {@link value} */
  read(): T;
  /** The equality this observable uses to discard no-op writes */
  isEqual(a: T, b: T): boolean;
  /** Register a listener; returns the handle used to remove it */
  subscribe(listener: Listener<T>): Subscription;
  /** Remove a listener; handles that are not registered here are ignored */
  unsubscribe(subscription: Subscription): void;
  /** RxJS view: emits the current value, then every notification */
  asObservable(): Observable<T>;
}

/**
 * Options accepted by {@link ObservableValue}.
 */
export interface ObservableValueOptions<T> {
  /**
   * Equality used to detect no-op writes. Defaults to the globally
   * configured strategy ('structural' unless changed with `configureWatch`).
   */
  equals?: EqualityStrategy | Equality<T>;
  /** Notify listeners even when a write is equal to the current value */
  alwaysNotify?: boolean;
  /** Debug name */
  name?: string;
  /** Logger override (default: the library logger for this module) */
  logger?: WatchLogger;
}

interface ListenerEntry<T> {
  readonly listener: Listener<T>;
  active: boolean;
}

/**
 * A mutable value that synchronously notifies listeners when it changes.
 *
 * Writes that are equal to the current value (under the observable's
 * equality) are discarded without touching any listener. Accepted writes
 * notify every listener registered at the start of the wave, in
 * registration order, before `write` returns. A listener may write to this
 * or any other observable; the nested wave completes before the outer wave
 * moves on to its next listener.
 *
 * @typeParam T - The type of value being held
 *
 * @example Basic usage
 * ```typescript
 * const counter = new ObservableValue(0);
 *
 * const sub = counter.subscribe((value, previous) => {
 *   console.log(`counter: ${previous} -> ${value}`);
 * });
 *
 * counter.value = 1; // logs "counter: 0 -> 1"
 * counter.write(1);  // no-op, equal value
 * counter.reset();   // logs "counter: 1 -> 0"
 *
 * sub.unsubscribe();
 * ```
 *
 * @example Structural equality
 * ```typescript
 * const filters = new ObservableValue({ tags: ['a'] });
 * filters.write({ tags: ['a'] }); // no-op, structurally equal
 *
 * const handle = new ObservableValue(socket, { equals: 'identity' });
 * ```
 *
 * @see {@link CombinedObservable} for values derived from several sources
 */
export class ObservableValue<T> implements ReadonlyObservable<T> {
  /** The value supplied at construction; {@link reset} restores it */
  readonly initial: T;
  readonly name: string | undefined;

  protected readonly logger: WatchLogger;
  private current: T;
  private readonly equality: Equality<T>;
  private alwaysNotifyEnabled: boolean;
  private readonly entries: ListenerEntry<T>[] = [];
  private readonly handles = new Map<Subscription, ListenerEntry<T>>();
  private readonly destroy$ = new Subject<void>();
  private disposed = false;

  constructor(initialValue: T, options: ObservableValueOptions<T> = {}) {
    this.initial = initialValue;
    this.current = initialValue;
    this.name = options.name;
    this.equality = resolveEquality(options.equals ?? getWatchConfig().equality);
    this.alwaysNotifyEnabled = options.alwaysNotify ?? false;
    this.logger = options.logger ?? getLogger('observable');
  }

  /**
   * Get the current value synchronously.
   */
  get value(): T {
    return this.current;
  }

  /**
   * Set a new value; equivalent to {@link write}.
   */
  set value(newValue: T) {
    this.write(newValue);
  }

  read(): T {
    return this.current;
  }

  /**
   * Replace the current value and notify listeners.
   *
   * @param newValue - The value to store
   * @returns `true` when the value changed, `false` for a discarded (equal) write
   */
  write(newValue: T): boolean {
    const previous = this.current;
    if (this.disposed) {
      this.logger.warn('write after dispose', { name: this.name });
    }

    if (this.equality(previous, newValue)) {
      if (this.alwaysNotifyEnabled) {
        this.notify(previous, previous);
      }
      return false;
    }

    this.current = newValue;
    if (this.logger.isEnabled('debug')) {
      this.logger.debug('write accepted', { name: this.name, listeners: this.entries.length });
    }
    this.notify(newValue, previous);
    return true;
  }

  /**
   * Restore the initial value. Subject to the same equality rule as {@link write}.
   */
  reset(): boolean {
    return this.write(this.initial);
  }

  /**
   * Notify every listener with the current value without changing it.
   *
   * Useful after mutating a held object in place, which no equality
   * strategy can detect.
   */
  refresh(): void {
    this.logger.debug('refresh', { name: this.name });
    this.notify(this.current, this.current);
  }

  /** Enable or disable notification on equal writes. */
  setAlwaysNotify(enabled: boolean): void {
    this.alwaysNotifyEnabled = enabled;
  }

  get isAlwaysNotifying(): boolean {
    return this.alwaysNotifyEnabled;
  }

  isEqual(a: T, b: T): boolean {
    return this.equality(a, b);
  }

  /** Number of registered listeners */
  get listenerCount(): number {
    return this.entries.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Register a listener for accepted writes.
   *
   * The listener is not called with the current value; it first fires on the
   * next accepted write. Registering the same function twice yields two
   * independent registrations.
   *
   * @throws {@link WatchError} `WATCH_L200` if the observable was disposed
   */
  subscribe(listener: Listener<T>): Subscription {
    if (this.disposed) {
      throw new WatchError({ code: 'WATCH_L200', context: { name: this.name } });
    }

    const entry: ListenerEntry<T> = { listener, active: true };
    this.entries.push(entry);

    const subscription: Subscription = new Subscription(() => {
      this.removeEntry(entry);
      this.handles.delete(subscription);
    });
    this.handles.set(subscription, entry);

    return subscription;
  }

  /**
   * Remove a listener registered on this observable.
   *
   * Unknown or already removed handles are ignored, so teardown code can run
   * any number of times.
   */
  unsubscribe(subscription: Subscription): void {
    if (!this.handles.has(subscription)) return;
    subscription.unsubscribe();
  }

  /**
   * Get an RxJS observable of this value.
   *
   * Emits the current value on subscription, then the value of every
   * notification. Completes when {@link dispose} is called.
   */
  asObservable(): Observable<T> {
    return new Observable<T>((subscriber) => {
      if (this.disposed) {
        subscriber.complete();
        return undefined;
      }

      subscriber.next(this.current);
      const listener = this.subscribe((value) => subscriber.next(value));
      const destroyed = this.destroy$.subscribe(() => subscriber.complete());

      return () => {
        listener.unsubscribe();
        destroyed.unsubscribe();
      };
    });
  }

  /**
   * Remove every listener and complete RxJS streams.
   *
   * The value stays readable and writable afterwards, but nobody is
   * notified, new subscriptions are refused and each write logs a warning.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const listeners = this.entries.length;
    this.destroy$.next();
    this.destroy$.complete();
    for (const subscription of [...this.handles.keys()]) {
      subscription.unsubscribe();
    }
    this.logger.info('disposed', { name: this.name, listeners });
  }

  /**
   * Deliver one notification wave to the listeners registered right now.
   *
   * Listeners added during the wave wait for the next one; listeners removed
   * during the wave are skipped if their turn has not come yet.
   */
  protected notify(value: T, previous: T): void {
    if (this.entries.length === 0) return;

    const snapshot = this.entries.slice();
    for (const entry of snapshot) {
      if (entry.active) {
        entry.listener(value, previous);
      }
    }
  }

  private removeEntry(entry: ListenerEntry<T>): void {
    entry.active = false;
    const index = this.entries.indexOf(entry);
    if (index !== -1) {
      this.entries.splice(index, 1);
    }
  }
}
