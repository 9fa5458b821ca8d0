/**
 * utils.ts
 *
 * Pure, side-effect-free utility functions shared across the core system.
 * Nothing in this file should import runtime code from other project files —
 * it is the lowest layer of the dependency graph.
 */

import type { PaginatorKey, PaginatorHash } from './types'

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Returns true if `value` is a finite, non-negative number suitable for use
 * as a setTimeout duration (gcTime, request timeout).
 *
 * Explicitly rejects Infinity, negative numbers and non-numbers.
 */
export function isValidTimeout(value: unknown): value is number {
  return typeof value === 'number' && value >= 0 && value !== Infinity
}

/** True for null and undefined, the two spellings of "no next page". */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Returns true when `val` is a plain data object — i.e. created via `{}` or
 * `Object.create(null)` — as opposed to a class instance, array, or null.
 */
export function isPlainObject(val: unknown): val is Record<string, unknown> {
  if (typeof val !== 'object' || val === null) return false
  const prototype = Object.getPrototypeOf(val) as unknown
  return (
    prototype === Object.prototype ||
    prototype === null ||
    Object.getPrototypeOf(prototype) === null
  )
}

/**
 * Returns true for any non-null object, including class instances and Error
 * subclasses. Used to read optional properties off unknown failures.
 */
export function isObjectLike(val: unknown): val is Record<PropertyKey, unknown> {
  return typeof val === 'object' && val !== null
}

// ---------------------------------------------------------------------------
// Paginator key hashing
// ---------------------------------------------------------------------------

/**
 * Produces a stable JSON string from any paginator key array.
 *
 * Plain-object values have their keys sorted before serialisation, so
 * `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` produce the same hash.
 *
 * @example
 * hashPaginatorKey(['products', { category: 'phones', limit: 20 }])
 * // => '["products",{"category":"phones","limit":20}]'
 */
export function hashPaginatorKey(paginatorKey: PaginatorKey): PaginatorHash {
  return JSON.stringify(paginatorKey, (_key, val: unknown) => {
    if (isPlainObject(val)) {
      return Object.keys(val)
        .sort()
        .reduce<Record<string, unknown>>((result, key) => {
          result[key] = val[key]
          return result
        }, {})
    }
    return val
  })
}

/**
 * Determines whether `paginatorKey` matches `target`.
 *
 * Exact mode: both hashes must be identical.
 * Partial mode (default): every element of `target` must deeply equal the
 * element of `paginatorKey` at the same index; `paginatorKey` may be longer.
 *
 * @example
 * matchesPaginatorKey(['feed', 'home'], ['feed'], false)  // true
 * matchesPaginatorKey(['feed', 'home'], ['feed'], true)   // false
 */
export function matchesPaginatorKey(
  paginatorKey: PaginatorKey,
  target: PaginatorKey,
  exact: boolean,
): boolean {
  if (exact) {
    return hashPaginatorKey(paginatorKey) === hashPaginatorKey(target)
  }
  if (paginatorKey.length < target.length) return false
  return target.every(
    (element, index) =>
      hashPaginatorKey([element]) === hashPaginatorKey([paginatorKey[index]]),
  )
}

// ---------------------------------------------------------------------------
// Functional utilities
// ---------------------------------------------------------------------------

/** A function that does nothing. Used as a safe default callback. */
export const noop = (): void => {}
