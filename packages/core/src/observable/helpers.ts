/**
 * Immutable-update helpers for common value shapes.
 *
 * Every helper builds a new value and hands it to `write`, so the usual
 * equality rule applies: a helper that produces an equal value notifies
 * nobody. Containers are copied rather than mutated, which keeps identity
 * equality meaningful for observables created with `equals: 'identity'`.
 * {@link rangedValue} and {@link maxLengthText} construct observables with a
 * constrained initial value instead.
 *
 * @module observable/helpers
 */

import { WatchError } from '../errors/watch-error.js';
import { ObservableValue, type ObservableValueOptions } from './observable.js';

function invalidArgument(message: string, context: Record<string, unknown>): WatchError {
  return new WatchError({ code: 'WATCH_A400', message, context });
}

// ── Numbers ───────────────────────────────────────────────

export function increment(target: ObservableValue<number>, amount = 1): boolean {
  return target.write(target.read() + amount);
}

export function decrement(target: ObservableValue<number>, amount = 1): boolean {
  return target.write(target.read() - amount);
}

export function absValue(target: ObservableValue<number>): boolean {
  return target.write(Math.abs(target.read()));
}

/**
 * Clamp the current value into `[min, max]`.
 *
 * @throws {@link WatchError} `WATCH_A400` when `min > max`
 */
export function clampValue(target: ObservableValue<number>, min: number, max: number): boolean {
  if (min > max) {
    throw invalidArgument(`Invalid clamp range: min ${min} is greater than max ${max}`, {
      min,
      max,
    });
  }
  return target.write(clamp(target.read(), min, max));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Create an observable whose initial value is clamped into `[min, max]`.
 * Later writes are not constrained.
 *
 * @throws {@link WatchError} `WATCH_A400` when `min > max`
 */
export function rangedValue(
  initial: number,
  min: number,
  max: number,
  options?: ObservableValueOptions<number>
): ObservableValue<number> {
  if (min > max) {
    throw invalidArgument(`Invalid range: min ${min} is greater than max ${max}`, { min, max });
  }
  return new ObservableValue(clamp(initial, min, max), options);
}

// ── Booleans ──────────────────────────────────────────────

export function toggle(target: ObservableValue<boolean>): boolean {
  return target.write(!target.read());
}

export function setTrue(target: ObservableValue<boolean>): boolean {
  return target.write(true);
}

export function setFalse(target: ObservableValue<boolean>): boolean {
  return target.write(false);
}

// ── Strings ───────────────────────────────────────────────

export function appendText(target: ObservableValue<string>, text: string): boolean {
  return target.write(target.read() + text);
}

export function clearText(target: ObservableValue<string>): boolean {
  return target.write('');
}

export function upperCaseText(target: ObservableValue<string>): boolean {
  return target.write(target.read().toUpperCase());
}

export function lowerCaseText(target: ObservableValue<string>): boolean {
  return target.write(target.read().toLowerCase());
}

export function trimText(target: ObservableValue<string>): boolean {
  return target.write(target.read().trim());
}

/**
 * @throws {@link WatchError} `WATCH_A400` when `maxLength` is negative
 */
export function truncateText(target: ObservableValue<string>, maxLength: number): boolean {
  if (maxLength < 0) {
    throw invalidArgument(`Invalid maxLength: ${maxLength}`, { maxLength });
  }
  return target.write(target.read().slice(0, maxLength));
}

/**
 * Create an observable whose initial text is cut to `maxLength` characters.
 * Later writes are not constrained.
 *
 * @throws {@link WatchError} `WATCH_A400` when `maxLength` is negative
 */
export function maxLengthText(
  initial: string,
  maxLength: number,
  options?: ObservableValueOptions<string>
): ObservableValue<string> {
  if (maxLength < 0) {
    throw invalidArgument(`Invalid maxLength: ${maxLength}`, { maxLength });
  }
  return new ObservableValue(initial.slice(0, maxLength), options);
}

// ── Arrays ────────────────────────────────────────────────

export function pushItem<T>(target: ObservableValue<T[]>, ...items: T[]): boolean {
  if (items.length === 0) return false;
  return target.write([...target.read(), ...items]);
}

/** Remove the first occurrence of `item` (by identity). */
export function removeItem<T>(target: ObservableValue<T[]>, item: T): boolean {
  const current = target.read();
  const index = current.indexOf(item);
  if (index === -1) return false;
  return target.write([...current.slice(0, index), ...current.slice(index + 1)]);
}

export function pushAll<T>(target: ObservableValue<T[]>, items: Iterable<T>): boolean {
  return pushItem(target, ...items);
}

export function clearItems<T>(target: ObservableValue<T[]>): boolean {
  return target.write([]);
}

/**
 * Insert `item` before position `index` (`index === length` appends).
 * An index outside `[0, length]` leaves the array untouched.
 */
export function insertItem<T>(target: ObservableValue<T[]>, index: number, item: T): boolean {
  const current = target.read();
  if (!Number.isInteger(index) || index < 0 || index > current.length) return false;
  return target.write([...current.slice(0, index), item, ...current.slice(index)]);
}

/** Remove the item at `index`; an index outside `[0, length)` is ignored. */
export function removeItemAt<T>(target: ObservableValue<T[]>, index: number): boolean {
  const current = target.read();
  if (!Number.isInteger(index) || index < 0 || index >= current.length) return false;
  return target.write([...current.slice(0, index), ...current.slice(index + 1)]);
}

// ── Maps ──────────────────────────────────────────────────

export function setEntry<K, V>(target: ObservableValue<Map<K, V>>, key: K, value: V): boolean {
  const next = new Map(target.read());
  next.set(key, value);
  return target.write(next);
}

export function deleteEntry<K, V>(target: ObservableValue<Map<K, V>>, key: K): boolean {
  const current = target.read();
  if (!current.has(key)) return false;
  const next = new Map(current);
  next.delete(key);
  return target.write(next);
}

/** Copy every entry of `entries` over the current map. */
export function setEntries<K, V>(
  target: ObservableValue<Map<K, V>>,
  entries: Iterable<readonly [K, V]>
): boolean {
  const next = new Map(target.read());
  for (const [key, value] of entries) {
    next.set(key, value);
  }
  return target.write(next);
}

export function clearEntries<K, V>(target: ObservableValue<Map<K, V>>): boolean {
  return target.write(new Map());
}

/** Flip a boolean flag; a missing flag counts as `false`. */
export function toggleFlag(target: ObservableValue<Map<string, boolean>>, key: string): boolean {
  return setEntry(target, key, !(target.read().get(key) ?? false));
}

// ── Sets ──────────────────────────────────────────────────

export function addMember<T>(target: ObservableValue<Set<T>>, member: T): boolean {
  const current = target.read();
  if (current.has(member)) return false;
  return target.write(new Set([...current, member]));
}

export function deleteMember<T>(target: ObservableValue<Set<T>>, member: T): boolean {
  const current = target.read();
  if (!current.has(member)) return false;
  const next = new Set(current);
  next.delete(member);
  return target.write(next);
}

export function addMembers<T>(target: ObservableValue<Set<T>>, members: Iterable<T>): boolean {
  return target.write(new Set([...target.read(), ...members]));
}

export function clearMembers<T>(target: ObservableValue<Set<T>>): boolean {
  return target.write(new Set());
}
