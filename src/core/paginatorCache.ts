/**
 * paginatorCache.ts
 *
 * A bounded, explicitly owned registry of Paginator instances keyed by a
 * hashed paginator key.
 *
 * Responsibilities:
 * - The factory for cached paginators (build()). One paginator per key.
 * - Least-recently-used eviction once more than `maxSize` paginators are held.
 *   Only a paginator with no listeners and nothing in flight is evicted; when
 *   none qualifies the cache stays over capacity until one does.
 * - Broadcasting added / removed / updated events to subscribers.
 *
 * Circular-dependency resolution:
 *   paginator.ts       →  PaginatorCacheInterface (declared there)
 *   paginatorCache.ts  →  Paginator class
 */

import type {
  CachedPaginatorOptions,
  PageKey,
  PaginatorFilters,
  PaginatorHash,
} from './types'
import type { Logger } from './logger'
import { createLogger } from './logger'
import { Subscribable } from './subscribable'
import { notifyManager } from './notifyManager'
import { hashPaginatorKey, matchesPaginatorKey } from './utils'
import { Paginator } from './paginator'
import type {
  PaginatorCacheInterface,
  PaginatorCacheNotifyEvent,
  PaginatorHandle,
} from './paginator'
import { DEFAULT_MAX_PAGINATORS } from './config'

export interface PaginatorCacheConfig {
  /** Most paginators held before LRU eviction. Defaults to 50. */
  maxSize?: number
  logger?: Logger
}

export type PaginatorCacheListener = (event: PaginatorCacheNotifyEvent) => void

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

/** True when `paginator` satisfies every criterion in `filters`. */
export function matchesPaginator(paginator: PaginatorHandle, filters: PaginatorFilters): boolean {
  const { paginatorKey, exact = false, status, predicate } = filters

  if (paginatorKey !== undefined) {
    if (
      paginator.paginatorKey === undefined ||
      !matchesPaginatorKey(paginator.paginatorKey, paginatorKey, exact)
    ) {
      return false
    }
  }

  if (status !== undefined && paginator.getStatus() !== status) {
    return false
  }

  if (predicate && !predicate(paginator)) {
    return false
  }

  return true
}

// ---------------------------------------------------------------------------
// PaginatorCache
// ---------------------------------------------------------------------------

export class PaginatorCache
  extends Subscribable<PaginatorCacheListener>
  implements PaginatorCacheInterface
{
  readonly maxSize: number

  /** Insertion order doubles as recency order: the first entry is the least recently used. */
  #paginators = new Map<PaginatorHash, PaginatorHandle>()
  #logger: Logger

  constructor(config: PaginatorCacheConfig = {}) {
    super()
    this.maxSize = config.maxSize ?? DEFAULT_MAX_PAGINATORS
    this.#logger = config.logger ?? createLogger('paginatorCache')
  }

  /**
   * Return the paginator registered under `options.paginatorKey`, updating its
   * options, or create and register a new one.
   */
  build<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
    options: CachedPaginatorOptions<TItem, TResponse, TPageKey>,
  ): Paginator<TItem, TResponse, TPageKey> {
    const paginatorHash = hashPaginatorKey(options.paginatorKey)
    const existing = this.get<TItem, TResponse, TPageKey>(paginatorHash)

    if (existing) {
      this.#touch(paginatorHash, existing)
      existing.setOptions(options)
      return existing
    }

    const paginator = new Paginator<TItem, TResponse, TPageKey>({
      options,
      cache: this,
      paginatorKey: options.paginatorKey,
      paginatorHash,
    })
    this.#paginators.set(paginatorHash, paginator)
    this.notify({ type: 'added', paginator })
    this.#evict(paginator)

    return paginator
  }

  /** Remove and destroy a paginator. A no-op when it is no longer registered. */
  remove(paginator: PaginatorHandle): void {
    if (paginator.paginatorHash === undefined) return
    if (this.#paginators.get(paginator.paginatorHash) !== paginator) return

    this.#paginators.delete(paginator.paginatorHash)
    paginator.destroy()
    this.notify({ type: 'removed', paginator })
  }

  /** Destroy every paginator and empty the cache. */
  clear(): void {
    notifyManager.batch(() => {
      this.getAll().forEach((paginator) => {
        this.remove(paginator)
      })
    })
  }

  get<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
    paginatorHash: PaginatorHash,
  ): Paginator<TItem, TResponse, TPageKey> | undefined {
    // Cast is safe: build() only stores a Paginator under the hash of its own
    // key, and callers use one item type per key.
    return this.#paginators.get(paginatorHash) as Paginator<TItem, TResponse, TPageKey> | undefined
  }

  getAll(): PaginatorHandle[] {
    return [...this.#paginators.values()]
  }

  get size(): number {
    return this.#paginators.size
  }

  find(filters: PaginatorFilters): PaginatorHandle | undefined {
    return this.getAll().find((paginator) => matchesPaginator(paginator, filters))
  }

  findAll(filters: PaginatorFilters = {}): PaginatorHandle[] {
    const paginators = this.getAll()
    if (Object.keys(filters).length === 0) return paginators
    return paginators.filter((paginator) => matchesPaginator(paginator, filters))
  }

  /**
   * Dispatch an event to every subscriber inside one notification batch.
   * A subscriber that throws is logged and does not stop the others.
   */
  notify(event: PaginatorCacheNotifyEvent): void {
    notifyManager.batch(() => {
      this.listeners.forEach((listener) => {
        try {
          listener(event)
        } catch (error) {
          this.#logger.error({ err: error, event: event.type }, 'Paginator cache listener threw')
        }
      })
    })
  }

  // -------------------------------------------------------------------------
  // LRU
  // -------------------------------------------------------------------------

  #touch(paginatorHash: PaginatorHash, paginator: PaginatorHandle): void {
    this.#paginators.delete(paginatorHash)
    this.#paginators.set(paginatorHash, paginator)
  }

  /** Drop least recently used idle paginators until within capacity, never `keep`. */
  #evict(keep: PaginatorHandle): void {
    while (this.#paginators.size > this.maxSize) {
      const candidate = this.getAll().find(
        (paginator) =>
          paginator !== keep && !paginator.hasListeners() && !paginator.isFetching(),
      )
      if (!candidate) {
        this.#logger.warn(
          { size: this.#paginators.size, maxSize: this.maxSize },
          'Paginator cache over capacity; every paginator is in use',
        )
        return
      }
      this.#logger.debug({ paginatorHash: candidate.paginatorHash }, 'Evicting paginator')
      this.remove(candidate)
    }
  }
}
