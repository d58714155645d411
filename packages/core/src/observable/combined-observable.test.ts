import { describe, expect, it, vi } from 'vitest';
import { WatchError } from '../errors/watch-error.js';
import { CombinedObservable } from './combined-observable.js';
import { ObservableValue } from './observable.js';

describe('CombinedObservable', () => {
  it('should compute the initial value from all sources', () => {
    const a = new ObservableValue(1);
    const b = new ObservableValue(2);
    const sum = new CombinedObservable([a, b], (values) => values.reduce((x, y) => x + y, 0));

    expect(sum.value).toBe(3);
    expect(sum.recomputeCount).toBe(0);
    expect(a.listenerCount).toBe(1);
    expect(b.listenerCount).toBe(1);
  });

  it('should fail with WATCH_C100 before calling the combiner when sources are empty', () => {
    const combiner = vi.fn(() => 0);

    expect(() => new CombinedObservable<number, number>([], combiner)).toThrow(WatchError);
    try {
      new CombinedObservable<number, number>([], combiner);
    } catch (error) {
      expect(WatchError.isCode(error, 'WATCH_C100')).toBe(true);
      expect(WatchError.isCategory(error, 'construction')).toBe(true);
    }
    expect(combiner).not.toHaveBeenCalled();
  });

  it('should recombine once per upstream write using every current value', () => {
    const a = new ObservableValue<number | string>(1);
    const b = new ObservableValue<number | string>('');
    const combiner = vi.fn((values: readonly (number | string)[]) => values.join(':'));
    const combined = new CombinedObservable([a, b], combiner);

    expect(combined.value).toBe('1:');
    expect(combiner).toHaveBeenCalledTimes(1);

    a.write(2);
    expect(combined.value).toBe('2:');
    expect(combiner).toHaveBeenCalledTimes(2);

    b.write('x');
    expect(combined.value).toBe('2:x');
    expect(combiner).toHaveBeenCalledTimes(3);
    expect(combined.recomputeCount).toBe(2);
  });

  it('should only notify its own listeners when the combined value changes', () => {
    const a = new ObservableValue(3);
    const b = new ObservableValue(4);
    const max = new CombinedObservable([a, b], (values) => Math.max(...values));
    const listener = vi.fn();
    max.subscribe(listener);

    a.write(1); // max stays 4
    b.write(9);

    expect(max.recomputeCount).toBe(2);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(9, 4);
  });

  it('should settle before the triggering write returns', () => {
    const source = new ObservableValue(1);
    const doubled = new CombinedObservable([source], ([v]) => (v ?? 0) * 2);
    const quadrupled = new CombinedObservable([doubled], ([v]) => (v ?? 0) * 2);
    const calls: string[] = [];

    source.subscribe(() => calls.push(`source listener sees ${quadrupled.value}`));
    quadrupled.subscribe((v) => calls.push(`quadrupled:${v}`));

    source.write(2);

    // the combined chain subscribed first, so it has fully settled before the
    // source's own later listener runs
    expect(calls).toEqual(['quadrupled:8', 'source listener sees 8']);
  });

  it('should fire once per registration when a source is aliased', () => {
    const a = new ObservableValue(1);
    const combiner = vi.fn((values: readonly number[]) => values[0]! + values[1]!);
    const combined = new CombinedObservable([a, a], combiner);
    const listener = vi.fn();
    combined.subscribe(listener);

    expect(a.listenerCount).toBe(2);

    a.write(5);

    expect(combined.value).toBe(10);
    expect(combiner).toHaveBeenCalledTimes(3);
    expect(combined.recomputeCount).toBe(2);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should apply the combined equality option', () => {
    const a = new ObservableValue([1, 2]);
    const combined = new CombinedObservable([a], ([v]) => ({ first: v?.[0] }), {
      equals: 'identity',
    });
    const listener = vi.fn();
    combined.subscribe(listener);

    a.write([1, 3]);

    expect(listener).toHaveBeenCalledTimes(1);
  });

  describe('combiner failure', () => {
    it('should propagate to the writer and keep the last good value', () => {
      const a = new ObservableValue(1);
      const combined = new CombinedObservable([a], ([v]) => {
        if (v === 13) throw new Error('unlucky');
        return (v ?? 0) * 10;
      });
      const listener = vi.fn();
      combined.subscribe(listener);

      let caught: unknown;
      try {
        a.write(13);
      } catch (error) {
        caught = error;
      }

      expect(WatchError.isCode(caught, 'WATCH_D300')).toBe(true);
      expect(WatchError.isWatchError(caught) && caught.cause?.message).toBe('unlucky');
      expect(combined.value).toBe(10);
      expect(a.value).toBe(13);
      expect(listener).not.toHaveBeenCalled();

      a.write(2);
      expect(combined.value).toBe(20);
    });

    it('should fail construction when the initial combination throws', () => {
      const a = new ObservableValue(1);

      expect(
        () =>
          new CombinedObservable([a], () => {
            throw new Error('boom');
          })
      ).toThrow('boom');
      expect(a.listenerCount).toBe(0);
    });

    it('should wrap non-Error throws', () => {
      const a = new ObservableValue(1);
      const combined = new CombinedObservable([a], ([v]) => {
        if (v === 2) throw 'bad input';
        return v;
      });

      expect(() => a.write(2)).toThrow('bad input');
      expect(combined.value).toBe(1);
    });
  });

  describe('dispose()', () => {
    it('should remove the source registrations and its own listeners', () => {
      const a = new ObservableValue(1);
      const b = new ObservableValue(2);
      const combined = new CombinedObservable([a, b], (values) => values.join(','));
      const listener = vi.fn();
      combined.subscribe(listener);

      combined.dispose();
      a.write(10);

      expect(a.listenerCount).toBe(0);
      expect(b.listenerCount).toBe(0);
      expect(combined.isConnected).toBe(false);
      expect(combined.value).toBe('1,2');
      expect(listener).not.toHaveBeenCalled();
      expect(() => combined.dispose()).not.toThrow();
    });
  });

  it('should refuse disposed sources', () => {
    const a = new ObservableValue(1);
    a.dispose();

    expect(() => new CombinedObservable([a], ([v]) => v)).toThrow(WatchError);
  });
});
