/**
 * Lifecycle adapter between an observable value and a render cycle.
 *
 * @module binding
 */

import type { Subscription } from 'rxjs';
import { getLogger } from '../config/watch-config.js';
import { WatchError } from '../errors/watch-error.js';
import type { ReadonlyObservable } from '../observable/observable.js';
import type { WatchLogger } from '../observability/logger.js';

/**
 * Decides whether a change is worth a re-render.
 *
 * `previous` is the value seen by the last notification (rendered or not),
 * `current` the value just read from `target`.
 */
export type ShouldRebuild<T> = (previous: T, current: T, target: ReadonlyObservable<T>) => boolean;

/** Re-render when the target's own equality says the value changed. */
export function defaultShouldRebuild<T>(
  previous: T,
  current: T,
  target: ReadonlyObservable<T>
): boolean {
  return !target.isEqual(previous, current);
}

export type BindingState = 'detached' | 'attached';

/** Why {@link BindingOptions.onRebuild} was called */
export interface RebuildContext<T> {
  readonly target: ReadonlyObservable<T>;
  readonly reason: 'attach' | 'change';
}

export interface BindingOptions<T> {
  /** Apply (or schedule) a render with `value` */
  onRebuild: (value: T, context: RebuildContext<T>) => void;
  /** Re-render predicate (default: {@link defaultShouldRebuild}) */
  shouldRebuild?: ShouldRebuild<T>;
  /** Debug name */
  name?: string;
  /** Logger override */
  logger?: WatchLogger;
}

/**
 * Keeps a render target synchronised with one observable at a time.
 *
 * States: `detached` → `attached(A)` → `attached(B)` → `detached`.
 *
 * - `attach(A)` reads A, renders that value and listens to A.
 * - `attach(B)` while attached to A removes the listener from A, reads B,
 *   listens to B and renders B's current value.
 * - On every notification the binding reads the target, asks
 *   `shouldRebuild(lastSeen, current)`, and records the value as the new
 *   `lastSeen` whether or not it rendered, so a suppressed change is never
 *   compared against again.
 * - `detach()` removes the listener; calling it again does nothing.
 *
 * @example
 * ```typescript
 * const binding = new Binding<number>({
 *   onRebuild: (count) => { label.textContent = String(count); },
 * });
 * binding.attach(counter);
 * // ...
 * binding.detach();
 * ```
 *
 * @see {@link withBinding} for scope-bound use
 */
export class Binding<T> {
  private readonly onRebuild: (value: T, context: RebuildContext<T>) => void;
  private readonly shouldRebuild: ShouldRebuild<T>;
  private readonly name: string | undefined;
  private readonly logger: WatchLogger;
  private currentTarget: ReadonlyObservable<T> | null = null;
  private subscription: Subscription | null = null;
  private seen: { value: T } | null = null;
  private rebuilds = 0;
  private disposed = false;

  constructor(options: BindingOptions<T>) {
    this.onRebuild = options.onRebuild;
    this.shouldRebuild = options.shouldRebuild ?? defaultShouldRebuild;
    this.name = options.name;
    this.logger = options.logger ?? getLogger('binding');
  }

  get state(): BindingState {
    return this.subscription && !this.subscription.closed ? 'attached' : 'detached';
  }

  /** The observable currently listened to, or `null` when detached */
  get target(): ReadonlyObservable<T> | null {
    return this.currentTarget;
  }

  /** The value seen by the last attach or notification */
  get lastSeen(): T | undefined {
    return this.seen?.value;
  }

  /** Renders requested so far, including the one on each attach */
  get rebuildCount(): number {
    return this.rebuilds;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Start observing `target`, replacing the current target if there is one.
   *
   * Attaching the target already observed does nothing.
   *
   * @throws {@link WatchError} `WATCH_L201` if the binding was disposed
   */
  attach(target: ReadonlyObservable<T>): void {
    if (this.disposed) {
      throw new WatchError({ code: 'WATCH_L201', context: { name: this.name } });
    }
    if (this.currentTarget === target && this.state === 'attached') return;

    const previousTarget = this.currentTarget;
    this.release();

    const value = target.read();
    const subscription = target.subscribe(() => this.handleChange());
    this.currentTarget = target;
    this.subscription = subscription;
    this.seen = { value };

    this.logger.debug(previousTarget ? 'binding retargeted' : 'binding attached', {
      name: this.name,
      target: target.name,
      from: previousTarget?.name,
    });

    this.rebuild(value, target, 'attach');
  }

  /** Stop observing. Safe to call any number of times. */
  detach(): void {
    if (!this.subscription) return;
    const target = this.currentTarget;
    this.release();
    this.logger.debug('binding detached', { name: this.name, target: target?.name });
  }

  /** Detach for good; later calls to {@link attach} throw `WATCH_L201`. */
  dispose(): void {
    this.detach();
    this.disposed = true;
  }

  private release(): void {
    if (this.subscription && this.currentTarget) {
      this.currentTarget.unsubscribe(this.subscription);
    }
    this.subscription = null;
    this.currentTarget = null;
  }

  private handleChange(): void {
    const target = this.currentTarget;
    const seen = this.seen;
    if (!target || !seen) return;

    const current = target.read();
    const rebuild = this.shouldRebuild(seen.value, current, target);
    this.seen = { value: current };

    if (rebuild) {
      this.rebuild(current, target, 'change');
    }
  }

  private rebuild(value: T, target: ReadonlyObservable<T>, reason: RebuildContext<T>['reason']): void {
    this.rebuilds++;
    this.onRebuild(value, { target, reason });
  }
}

/**
 * Run `fn` with a binding attached to `target`, detaching it on every exit
 * path (return or throw).
 *
 * @example
 * ```typescript
 * const frames: number[] = [];
 * withBinding(counter, { onRebuild: (v) => frames.push(v) }, () => {
 *   counter.value = 1;
 * });
 * counter.value = 2; // not observed
 * ```
 */
export function withBinding<T, R>(
  target: ReadonlyObservable<T>,
  options: BindingOptions<T>,
  fn: (binding: Binding<T>) => R
): R {
  const binding = new Binding(options);
  binding.attach(target);
  try {
    return fn(binding);
  } finally {
    binding.dispose();
  }
}
