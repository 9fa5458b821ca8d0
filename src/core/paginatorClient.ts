/**
 * paginatorClient.ts
 *
 * The public facade over one PaginatorCache.
 *
 * Users create one PaginatorClient, hand it to PaginatorClientProvider, and
 * reach paginators through getPaginator(). The client validates its settings
 * on construction and merges its default options into every paginator it
 * creates. It never fetches or holds list state itself.
 */

import type {
  CachedPaginatorOptions,
  DefaultPaginatorOptions,
  PageKey,
  PaginatorFilters,
} from './types'
import type { Paginator } from './paginator'
import type { PaginatorClientSettingsInput } from './config'
import { parseClientSettings } from './config'
import { PaginatorCache } from './paginatorCache'
import { createLogger } from './logger'
import { noop } from './utils'

export interface PaginatorClientConfig {
  /** Pre-built cache. When given, `cache.maxSize` is ignored. */
  paginatorCache?: PaginatorCache
  /** Options merged into every paginator unless it sets its own. */
  defaultOptions?: DefaultPaginatorOptions
  cache?: PaginatorClientSettingsInput['cache']
}

export class PaginatorClient {
  readonly #paginatorCache: PaginatorCache
  #defaultOptions: DefaultPaginatorOptions

  /**
   * @throws PaginatorConfigError when `timeout`, `gcTime` or `cache.maxSize`
   *   is out of range.
   */
  constructor(config: PaginatorClientConfig = {}) {
    const { defaultOptions = {} } = config
    const settings = parseClientSettings({
      defaultOptions: { timeout: defaultOptions.timeout, gcTime: defaultOptions.gcTime },
      cache: config.cache,
    })

    const logger = defaultOptions.logger ?? createLogger('paginatorClient')
    this.#defaultOptions = { ...defaultOptions, ...settings.defaultOptions }
    this.#paginatorCache =
      config.paginatorCache ??
      new PaginatorCache({ maxSize: settings.cache.maxSize, logger })

    logger.debug(
      { ...settings.defaultOptions, maxSize: this.#paginatorCache.maxSize },
      'Paginator client created',
    )
  }

  // -------------------------------------------------------------------------
  // Cache access
  // -------------------------------------------------------------------------

  getPaginatorCache(): PaginatorCache {
    return this.#paginatorCache
  }

  getDefaultOptions(): DefaultPaginatorOptions {
    return this.#defaultOptions
  }

  // -------------------------------------------------------------------------
  // Options normalization
  // -------------------------------------------------------------------------

  /** Per-paginator options win over the client's defaults. */
  defaultPaginatorOptions<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
    options: CachedPaginatorOptions<TItem, TResponse, TPageKey>,
  ): CachedPaginatorOptions<TItem, TResponse, TPageKey> {
    const defaults = this.#defaultOptions
    return {
      ...options,
      timeout: options.timeout ?? defaults.timeout,
      gcTime: options.gcTime ?? defaults.gcTime,
      classifyError: options.classifyError ?? defaults.classifyError,
      logger: options.logger ?? defaults.logger,
    }
  }

  // -------------------------------------------------------------------------
  // Paginators
  // -------------------------------------------------------------------------

  /** The cached paginator for `options.paginatorKey`, created on first use. */
  getPaginator<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
    options: CachedPaginatorOptions<TItem, TResponse, TPageKey>,
  ): Paginator<TItem, TResponse, TPageKey> {
    return this.#paginatorCache.build(this.defaultPaginatorOptions(options))
  }

  /** Refresh every matching paginator. Resolves once all have settled. */
  refreshPaginators(filters: PaginatorFilters = {}): Promise<void> {
    const paginators = this.#paginatorCache.findAll(filters)
    return Promise.all(paginators.map((paginator) => paginator.refresh())).then(noop)
  }

  /** Destroy and forget every matching paginator. */
  removePaginators(filters: PaginatorFilters = {}): void {
    this.#paginatorCache.findAll(filters).forEach((paginator) => {
      this.#paginatorCache.remove(paginator)
    })
  }

  /** Destroy every paginator. */
  clear(): void {
    this.#paginatorCache.clear()
  }
}
