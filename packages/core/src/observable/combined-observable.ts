import type { Subscription } from 'rxjs';
import { getLogger } from '../config/watch-config.js';
import { WatchError, ensureWatchError } from '../errors/watch-error.js';
import type { WatchLogger } from '../observability/logger.js';
import {
  ObservableValue,
  type ObservableValueOptions,
  type ReadonlyObservable,
} from './observable.js';

/** Computes a combined value from the current values of every source, in order. */
export type Combiner<T, R> = (values: readonly T[]) => R;

export type CombinedObservableOptions<R> = ObservableValueOptions<R>;

/**
 * Run a derivation function, converting failures into `WATCH_D300`.
 *
 * @internal
 */
export function runDerivation<R>(
  fn: () => R,
  logger: WatchLogger,
  context: Record<string, unknown>
): R {
  try {
    return fn();
  } catch (err) {
    const error = ensureWatchError(err, 'WATCH_D300', context);
    logger.error('derivation failed', error, context);
    throw error;
  }
}

function readAll<T>(sources: readonly ReadonlyObservable<T>[]): T[] {
  return sources.map((source) => source.read());
}

/**
 * An observable whose value is recomputed from a list of sources
 * (combine-latest).
 *
 * The value is computed once at construction, then again every time any
 * source notifies, always from the current values of all sources. The result
 * goes through the inherited {@link ObservableValue.write}, so listeners of
 * the combined value only hear about results that differ from the previous
 * one. Recomputation and re-notification finish before the source's `write`
 * returns.
 *
 * A source listed twice is subscribed twice; each registration fires on its
 * own, and the second recomputation is discarded by the equality check.
 *
 * @typeParam T - Element type shared by the sources
 * @typeParam R - Type of the combined value
 *
 * @example
 * ```typescript
 * const prices = [new ObservableValue(3), new ObservableValue(4)];
 * const total = new CombinedObservable(prices, (values) => values.reduce((a, b) => a + b, 0));
 *
 * total.value; // 7
 * prices[0].value = 10;
 * total.value; // 14
 * ```
 *
 * @see {@link combine2} and siblings for sources of different types
 */
export class CombinedObservable<T, R> extends ObservableValue<R> {
  readonly sources: readonly ReadonlyObservable<T>[];

  private readonly combiner: Combiner<T, R>;
  private upstream: Subscription[];
  private recomputations = 0;

  /**
   * @throws {@link WatchError} `WATCH_C100` when `sources` is empty
   * @throws {@link WatchError} `WATCH_D300` when the initial combination fails
   */
  constructor(
    sources: readonly ReadonlyObservable<T>[],
    combiner: Combiner<T, R>,
    options: CombinedObservableOptions<R> = {}
  ) {
    if (sources.length === 0) {
      throw new WatchError({ code: 'WATCH_C100', context: { name: options.name } });
    }

    const logger = options.logger ?? getLogger('combined');
    const initial = runDerivation(() => combiner(readAll(sources)), logger, {
      name: options.name,
      sources: sources.length,
    });

    super(initial, { ...options, logger });

    this.sources = [...sources];
    this.combiner = combiner;
    this.upstream = this.sources.map((source) => source.subscribe(() => this.recompute()));
  }

  /** Number of recomputations triggered by source notifications */
  get recomputeCount(): number {
    return this.recomputations;
  }

  /** Whether the upstream registrations are still installed */
  get isConnected(): boolean {
    return this.upstream.length > 0;
  }

  /**
   * Remove the listener installed on every source, then dispose this value.
   * Safe to call more than once.
   */
  override dispose(): void {
    for (const subscription of this.upstream) {
      subscription.unsubscribe();
    }
    this.upstream = [];
    super.dispose();
  }

  private recompute(): void {
    const next = runDerivation(() => this.combiner(readAll(this.sources)), this.logger, {
      name: this.name,
      sources: this.sources.length,
    });
    this.recomputations++;
    this.write(next);
  }
}
