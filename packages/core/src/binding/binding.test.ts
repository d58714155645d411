import { afterEach, describe, expect, it, vi } from 'vitest';
import { configureWatch, resetWatchConfig } from '../config/watch-config.js';
import { WatchError } from '../errors/watch-error.js';
import { combine2 } from '../observable/combine.js';
import { ObservableValue } from '../observable/observable.js';
import type { LogEntry } from '../observability/logger.js';
import { Binding, defaultShouldRebuild, withBinding } from './binding.js';

function recordingBinding<T>(shouldRebuild?: (previous: T, current: T) => boolean) {
  const renders: T[] = [];
  const binding = new Binding<T>({
    onRebuild: (value) => renders.push(value),
    shouldRebuild,
  });
  return { binding, renders };
}

describe('Binding', () => {
  afterEach(() => {
    resetWatchConfig();
  });

  it('should start detached', () => {
    const { binding, renders } = recordingBinding<number>();
    expect(binding.state).toBe('detached');
    expect(binding.target).toBeNull();
    expect(binding.lastSeen).toBeUndefined();
    expect(renders).toEqual([]);
  });

  describe('default shouldRebuild', () => {
    it('should render on attach and on each distinct write', () => {
      const source = new ObservableValue(1);
      const { binding, renders } = recordingBinding<number>();

      binding.attach(source);
      source.write(2);
      source.write(2);
      source.write(2);
      source.write(3);

      expect(renders).toEqual([1, 2, 3]);
      expect(binding.state).toBe('attached');
      expect(binding.rebuildCount).toBe(3);
    });

    it('should not render repeated values from an always-notifying source', () => {
      const source = new ObservableValue(1, { alwaysNotify: true });
      const { binding, renders } = recordingBinding<number>();

      binding.attach(source);
      source.write(2);
      source.write(2);
      source.refresh();

      expect(renders).toEqual([1, 2]);
    });

    it('should use the target equality', () => {
      const source = new ObservableValue({ n: 1 }, { equals: 'identity', alwaysNotify: true });
      expect(defaultShouldRebuild({ n: 1 }, { n: 1 }, source)).toBe(true);

      const structural = new ObservableValue({ n: 1 });
      expect(defaultShouldRebuild({ n: 1 }, { n: 1 }, structural)).toBe(false);
    });
  });

  describe('custom shouldRebuild', () => {
    it('should never render after attach when the predicate is always false', () => {
      const source = new ObservableValue(0);
      const { binding, renders } = recordingBinding<number>(() => false);

      binding.attach(source);
      source.write(1);
      source.write(2);
      source.write(3);

      expect(renders).toEqual([0]);
      expect(binding.lastSeen).toBe(3);
    });

    it('should leave no stale value for a binding attached right after', () => {
      const source = new ObservableValue(0);
      const silent = recordingBinding<number>(() => false);
      silent.binding.attach(source);
      source.write(1);
      source.write(2);
      silent.binding.detach();

      const fresh = recordingBinding<number>();
      fresh.binding.attach(source);
      source.write(2);

      expect(fresh.renders).toEqual([2]);
      expect(fresh.binding.lastSeen).toBe(2);
    });

    it('should compare against the latest seen value, not the last rendered one', () => {
      const source = new ObservableValue(0);
      const comparisons: Array<[number, number]> = [];
      const { binding, renders } = recordingBinding<number>((previous, current) => {
        comparisons.push([previous, current]);
        return current % 2 === 0;
      });

      binding.attach(source);
      source.write(1);
      source.write(2);
      source.write(3);

      expect(comparisons).toEqual([
        [0, 1],
        [1, 2],
        [2, 3],
      ]);
      expect(renders).toEqual([0, 2]);
    });

    it('should receive the target as third argument', () => {
      const source = new ObservableValue('a');
      const predicate = vi.fn(() => true);
      const binding = new Binding<string>({ onRebuild: () => undefined, shouldRebuild: predicate });

      binding.attach(source);
      source.write('b');

      expect(predicate).toHaveBeenCalledWith('a', 'b', source);
    });
  });

  describe('retargeting', () => {
    it('should render the new target immediately and forget the old one', () => {
      const x = new ObservableValue(5);
      const y = new ObservableValue(10);
      const { binding, renders } = recordingBinding<number>();

      binding.attach(x);
      binding.attach(y);
      x.write(6);

      expect(renders).toEqual([5, 10]);
      expect(x.listenerCount).toBe(0);
      expect(y.listenerCount).toBe(1);
      expect(binding.target).toBe(y);
      expect(binding.lastSeen).toBe(10);

      y.write(11);
      expect(renders).toEqual([5, 10, 11]);
    });

    it('should compare the first change on the new target against its own value', () => {
      const x = new ObservableValue(5);
      const y = new ObservableValue(10);
      const comparisons: Array<[number, number]> = [];
      const { binding } = recordingBinding<number>((previous, current) => {
        comparisons.push([previous, current]);
        return true;
      });

      binding.attach(x);
      binding.attach(y);
      y.write(11);

      expect(comparisons).toEqual([[10, 11]]);
    });

    it('should ignore attaching the current target again', () => {
      const source = new ObservableValue(1);
      const { binding, renders } = recordingBinding<number>();

      binding.attach(source);
      binding.attach(source);

      expect(renders).toEqual([1]);
      expect(source.listenerCount).toBe(1);
    });

    it('should tell onRebuild why it was called', () => {
      const x = new ObservableValue(1);
      const y = new ObservableValue(2);
      const reasons: string[] = [];
      const binding = new Binding<number>({
        onRebuild: (value, context) =>
          reasons.push(`${context.reason}:${value}:${context.target === y ? 'y' : 'x'}`),
      });

      binding.attach(x);
      x.write(3);
      binding.attach(y);

      expect(reasons).toEqual(['attach:1:x', 'change:3:x', 'attach:2:y']);
    });

    it('should stay detached when the new target refuses the subscription', () => {
      const x = new ObservableValue(1);
      const y = new ObservableValue(2);
      y.dispose();
      const { binding } = recordingBinding<number>();

      binding.attach(x);

      expect(() => binding.attach(y)).toThrow(WatchError);
      expect(binding.state).toBe('detached');
      expect(x.listenerCount).toBe(0);
    });
  });

  describe('detach()', () => {
    it('should stop rendering and be idempotent', () => {
      const source = new ObservableValue(1);
      const { binding, renders } = recordingBinding<number>();

      binding.attach(source);
      binding.detach();
      binding.detach();
      source.write(2);

      expect(renders).toEqual([1]);
      expect(binding.state).toBe('detached');
      expect(source.listenerCount).toBe(0);
    });

    it('should allow attaching again after detach', () => {
      const source = new ObservableValue(1);
      const { binding, renders } = recordingBinding<number>();

      binding.attach(source);
      binding.detach();
      source.write(2);
      binding.attach(source);

      expect(renders).toEqual([1, 2]);
    });

    it('should report detached when the target is disposed', () => {
      const source = new ObservableValue(1);
      const { binding } = recordingBinding<number>();

      binding.attach(source);
      source.dispose();

      expect(binding.state).toBe('detached');
    });

    it('should refuse attach after dispose', () => {
      const source = new ObservableValue(1);
      const { binding } = recordingBinding<number>();

      binding.attach(source);
      binding.dispose();

      expect(binding.isDisposed).toBe(true);
      expect(source.listenerCount).toBe(0);
      expect(() => binding.attach(source)).toThrow(WatchError);
    });
  });

  it('should observe the settled value of a combined chain', () => {
    const a = new ObservableValue(1);
    const b = new ObservableValue('');
    const label = combine2(a, b, (n, s) => `${n}:${s}`);
    const { binding, renders } = recordingBinding<string>();

    binding.attach(label);
    a.write(2);
    b.write('x');

    expect(renders).toEqual(['1:', '2:', '2:x']);
  });

  it('should log attach, retarget and detach at debug level', () => {
    const entries: LogEntry[] = [];
    configureWatch({ logLevel: 'debug', logHandler: (e) => entries.push(e) });
    const x = new ObservableValue(1, { name: 'x' });
    const y = new ObservableValue(2, { name: 'y' });
    const binding = new Binding<number>({ name: 'label', onRebuild: () => undefined });

    binding.attach(x);
    binding.attach(y);
    binding.detach();

    expect(entries.map((e) => e.message)).toEqual([
      'binding attached',
      'binding retargeted',
      'binding detached',
    ]);
    expect(entries[1]!.context).toEqual({ name: 'label', target: 'y', from: 'x' });
  });
});

describe('withBinding', () => {
  it('should detach after the scope returns', () => {
    const source = new ObservableValue(1);
    const renders: number[] = [];

    const result = withBinding(source, { onRebuild: (v) => renders.push(v) }, (binding) => {
      source.write(2);
      return binding.rebuildCount;
    });
    source.write(3);

    expect(result).toBe(2);
    expect(renders).toEqual([1, 2]);
    expect(source.listenerCount).toBe(0);
  });

  it('should detach when the scope throws', () => {
    const source = new ObservableValue(1);
    let inner: Binding<number> | undefined;

    expect(() =>
      withBinding(source, { onRebuild: () => undefined }, (binding) => {
        inner = binding;
        throw new Error('scope failed');
      })
    ).toThrow('scope failed');

    expect(source.listenerCount).toBe(0);
    expect(inner?.state).toBe('detached');
  });
});
