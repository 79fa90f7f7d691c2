/**
 * Record Combinators
 *
 * Pure helpers over string-keyed records. None of them mutates its input;
 * every operation returns a fresh object.
 *
 * Nested records form a tree: a value is a *record* when it is a non-null,
 * non-array object, and a leaf otherwise. `deepMerge` and `unflatten` walk
 * that tree recursively, so their input must be finite and acyclic.
 */

import * as O from "./option.js";
import * as E from "./either.js";
import type { Option } from "./option.js";
import type { Either } from "./either.js";

/**
 * A record whose values may themselves be records.
 */
export type RecordTree = Readonly<Record<string, unknown>>;

/**
 * Check whether a value is a record (a non-null, non-array object)
 */
export function isRecord(value: unknown): value is RecordTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Keep the entries for which `p(key, value)` holds.
 *
 * @example
 * ```typescript
 * filterWithKey((k) => k === "a", { a: 1, b: 2 }); // { a: 1 }
 * ```
 */
export function filterWithKey<V>(
  p: (key: string, value: V) => boolean,
  r: Readonly<Record<string, V>>,
): Record<string, V> {
  return Object.fromEntries(Object.entries(r).filter(([k, v]) => p(k, v)));
}

/**
 * Keep the entries whose key belongs to `keys`.
 */
export function filterByKeys<V>(
  keys: Iterable<string>,
  r: Readonly<Record<string, V>>,
): Record<string, V> {
  const keySet = new Set(keys);
  return filterWithKey((k) => keySet.has(k), r);
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Look up the value for a key. Missing keys and keys holding `null` or
 * `undefined` are None.
 */
export function lookup<V>(key: string, r: Readonly<Record<string, V | null | undefined>>): Option<V> {
  return Object.hasOwn(r, key) ? O.of(r[key]) : O.None;
}

/**
 * Look up every key of `keys`, in iteration order.
 *
 * Yields `Left(key)` for the first key without a value, otherwise `Right` of
 * the sub-record holding exactly those keys.
 *
 * @example
 * ```typescript
 * getByKeys(["a"], { a: 1, b: 2 });      // Right({ a: 1 })
 * getByKeys(["a", "c"], { a: 1, b: 2 }); // Left("c")
 * ```
 */
export function getByKeys<K extends string, V>(
  keys: Iterable<K>,
  r: Readonly<Record<string, V | null | undefined>>,
): Either<K, Record<string, V>> {
  const get = (key: K): Either<K, readonly [K, V]> =>
    O.fold(
      lookup(key, r),
      () => E.Left<K, readonly [K, V]>(key),
      (value) => E.Right<K, readonly [K, V]>([key, value]),
    );

  function* lookups(): Generator<Either<K, readonly [K, V]>> {
    for (const key of keys) yield get(key);
  }

  return E.map(E.sequence(lookups()), (pairs) => Object.fromEntries(pairs));
}

// ============================================================================
// Updates
// ============================================================================

/**
 * Remove a key
 */
export function remove<V>(key: string, r: Readonly<Record<string, V>>): Record<string, V> {
  return filterWithKey((k) => k !== key, r);
}

/**
 * Insert a key/value pair, replacing an existing value
 */
export function insert<V>(key: string, value: V, r: Readonly<Record<string, V>>): Record<string, V> {
  return { ...r, [key]: value };
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Curried one-level merge; entries of the second record win.
 *
 * @example
 * ```typescript
 * merge({ a: 1 })({ a: 2, b: 3 }); // { a: 2, b: 3 }
 * ```
 */
export function merge<V>(
  r1: Readonly<Record<string, V>>,
): (r2: Readonly<Record<string, V>>) => Record<string, V> {
  return (r2) => ({ ...r1, ...r2 });
}

/**
 * Recursive merge.
 *
 * Keys present in both records whose values are both records are merged
 * recursively. Any other conflict takes the value from `r2`. Arrays are
 * leaves and are never concatenated.
 *
 * @example
 * ```typescript
 * deepMerge({ a: { x: 1 } }, { a: { y: 2 } }); // { a: { x: 1, y: 2 } }
 * deepMerge({ a: 1 }, { a: 2 });               // { a: 2 }
 * ```
 */
export function deepMerge(r1: RecordTree, r2: RecordTree): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...r1, ...r2 };
  for (const [key, left] of Object.entries(r1)) {
    if (!Object.hasOwn(r2, key)) continue;
    const right = r2[key];
    if (isRecord(left) && isRecord(right)) {
      merged[key] = deepMerge(left, right);
    }
  }
  return merged;
}

/**
 * Turn delimited keys into nested records.
 *
 * Every entry becomes a singleton tree along its key path; the trees are
 * folded together with `deepMerge` in the record's iteration order, so a
 * later entry wins a leaf/record conflict. An empty separator leaves keys
 * unsplit.
 *
 * @example
 * ```typescript
 * unflatten({ "a.b": 1, "a.c": 2, x: 3 }); // { a: { b: 1, c: 2 }, x: 3 }
 * ```
 */
export function unflatten(r: RecordTree, sep = "."): Record<string, unknown> {
  const nest = ([head, ...tail]: readonly string[], value: unknown): RecordTree =>
    tail.length === 0 ? { [head]: value } : { [head]: nest(tail, value) };

  return Object.entries(r).reduce<Record<string, unknown>>(
    (acc, [key, value]) => deepMerge(acc, nest(sep === "" ? [key] : key.split(sep), value)),
    {},
  );
}
