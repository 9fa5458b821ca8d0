/**
 * pageKeyTracker.ts
 *
 * Remembers which page keys a paginator has requested and which key each
 * successful page pointed to next.
 *
 *   history  : [k0, k1, k2]          requested keys, in request order
 *   mapping  : { k0 → k1, k1 → k2 }  written only when a page succeeds
 *
 * The tip of the history is the key of the most recent request. If the tip
 * has a mapping, its page succeeded and the mapped value is the next key to
 * fetch (undefined meaning exhausted). If it has none, its page is in flight
 * or failed and the tip itself is what a retry re-requests.
 */

import type { PageKey, PageResult } from './types'
import { isAbsent } from './utils'

export class PageKeyTracker<TPageKey extends PageKey = PageKey> {
  readonly #firstKey: TPageKey
  #history: TPageKey[] = []
  #nextKeyByRequestedKey = new Map<TPageKey, TPageKey | undefined>()

  constructor(firstKey: TPageKey) {
    this.#firstKey = firstKey
  }

  /** The configured initial key. */
  firstKey(): TPageKey {
    return this.#firstKey
  }

  /**
   * The key to request after `requestedKey`, or undefined when there is no
   * further page.
   *
   * A page ends the walk when the parser flags it as last, when it is empty,
   * when it reports no next key, or when `loadedItemCount` has reached the
   * page's `totalItems`.
   */
  nextKeyAfter(
    _requestedKey: TPageKey,
    result: PageResult<unknown, TPageKey>,
    loadedItemCount?: number,
  ): TPageKey | undefined {
    if (result.isLastPage === true) return undefined
    if (!result.items.length) return undefined
    if (isAbsent(result.nextKey)) return undefined
    if (
      loadedItemCount !== undefined &&
      typeof result.totalItems === 'number' &&
      loadedItemCount >= result.totalItems
    ) {
      return undefined
    }
    return result.nextKey
  }

  /** Append `key` to the history unless it is already the tip. */
  recordRequest(key: TPageKey): void {
    if (this.#history.length && this.tip() === key) return
    this.#history.push(key)
  }

  /** Record that the page for `requestedKey` succeeded and pointed at `nextKey`. */
  recordMapping(requestedKey: TPageKey, nextKey: TPageKey | undefined): void {
    this.#nextKeyByRequestedKey.set(requestedKey, nextKey)
  }

  hasMapping(key: TPageKey): boolean {
    return this.#nextKeyByRequestedKey.has(key)
  }

  history(): ReadonlyArray<TPageKey> {
    return this.#history.slice()
  }

  /** The most recently requested key, or undefined before any request. */
  tip(): TPageKey | undefined {
    return this.#history[this.#history.length - 1]
  }

  /**
   * What the next fetch should request: the first key when nothing has been
   * requested, the tip when its page has not succeeded, otherwise the tip's
   * mapped successor. Undefined means the walk is exhausted.
   */
  nextKeyToFetch(): TPageKey | undefined {
    const tip = this.tip()
    if (tip === undefined) return this.#firstKey
    if (!this.#nextKeyByRequestedKey.has(tip)) return tip
    return this.#nextKeyByRequestedKey.get(tip)
  }

  /** Forget every request and mapping. */
  reset(): void {
    this.#history = []
    this.#nextKeyByRequestedKey.clear()
  }
}
