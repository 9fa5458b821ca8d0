/**
 * paginator.ts
 *
 * The fetch coordinator: walks page keys one page at a time, accumulates
 * items, classifies failures and exposes a read-only projection.
 *
 * A Paginator instance:
 * - Holds all state for one paginated list (items, status, last error…)
 * - Owns at most one in-flight PageRequest at a time
 * - Notifies its listeners and, when cached, its PaginatorCache on every
 *   state transition
 * - Schedules its own collection when cached and no listeners remain
 *
 * State machine:
 *
 *   idle ──loadFirstPage──▶ fetchingFirstPage ──ok, has next──▶ idle
 *                                              ──ok, no next───▶ exhausted
 *                                              ──failure───────▶ error
 *   idle ──loadNextPage───▶ fetchingNextPage  ──ok, has next──▶ idle
 *                                              ──ok, no next───▶ exhausted
 *                                              ──failure───────▶ error
 *   error ──retry─────────▶ fetchingFirstPage | fetchingNextPage (same key)
 *   any ───refresh────────▶ refreshing ──ok──▶ idle | exhausted ; ──failure──▶ error
 *
 * Commands never reject: each resolves with the projection current at the
 * moment its request settled (or immediately, when the command is a no-op).
 *
 * The PaginatorCacheInterface is declared here rather than imported from
 * paginatorCache.ts so this file never imports the cache (which imports it).
 */

import type {
  ClassifiedError,
  ErrorClassifier,
  FetchMode,
  PageKey,
  PageResult,
  PaginatorHash,
  PaginatorKey,
  PaginatorListener,
  PaginatorOptions,
  PaginatorResult,
  PaginatorState,
  PaginatorStatus,
} from './types'
import type { Logger } from './logger'
import { createLogger } from './logger'
import { Removable } from './removable'
import { PageRequest } from './pageRequest'
import { PageKeyTracker } from './pageKeyTracker'
import { classifyError } from './errorClassifier'
import { notifyManager } from './notifyManager'
import { DEFAULT_GC_TIME } from './config'

// ---------------------------------------------------------------------------
// Cache contract
// ---------------------------------------------------------------------------

/** The type-erased face of a paginator that a PaginatorCache works with. */
export interface PaginatorHandle {
  readonly paginatorKey: PaginatorKey | undefined
  readonly paginatorHash: PaginatorHash | undefined
  getStatus(): PaginatorStatus
  isFetching(): boolean
  hasListeners(): boolean
  refresh(): Promise<unknown>
  destroy(): void
}

export type PaginatorActionType = PaginatorAction<unknown>['type']

export type PaginatorCacheNotifyEvent =
  | { type: 'added'; paginator: PaginatorHandle }
  | { type: 'removed'; paginator: PaginatorHandle }
  | { type: 'updated'; paginator: PaginatorHandle; actionType: PaginatorActionType }

export interface PaginatorCacheInterface {
  notify(event: PaginatorCacheNotifyEvent): void
  remove(paginator: PaginatorHandle): void
}

// ---------------------------------------------------------------------------
// Constructor config
// ---------------------------------------------------------------------------

export interface PaginatorConfig<TItem, TResponse, TPageKey extends PageKey = PageKey> {
  options: PaginatorOptions<TItem, TResponse, TPageKey>
  /** Owning cache. Omitted for standalone paginators. */
  cache?: PaginatorCacheInterface
  paginatorKey?: PaginatorKey
  paginatorHash?: PaginatorHash
}

// ---------------------------------------------------------------------------
// State-machine actions
// ---------------------------------------------------------------------------

export type PaginatorAction<TItem, TPageKey extends PageKey = PageKey> =
  | { type: 'fetch'; mode: FetchMode }
  | {
      type: 'success'
      items: ReadonlyArray<TItem>
      nextPageKey: TPageKey | undefined
      totalItems: number | undefined
    }
  | { type: 'error'; error: ClassifiedError; pageKey: TPageKey }

// ---------------------------------------------------------------------------
// Reducer (pure)
// ---------------------------------------------------------------------------

function fetchStatusFor(mode: FetchMode): PaginatorStatus {
  switch (mode) {
    case 'first':
      return 'fetchingFirstPage'
    case 'next':
      return 'fetchingNextPage'
    case 'refresh':
      return 'refreshing'
  }
}

export function paginatorReducer<TItem, TPageKey extends PageKey>(
  state: PaginatorState<TItem, TPageKey>,
  action: PaginatorAction<TItem, TPageKey>,
): PaginatorState<TItem, TPageKey> {
  switch (action.type) {
    case 'fetch':
      return {
        ...state,
        status: fetchStatusFor(action.mode),
        error: null,
        failedPageKey: undefined,
        // A refresh discards everything loaded so far before its request settles.
        ...(action.mode === 'refresh' && {
          items: [],
          nextPageKey: undefined,
          pageCount: 0,
          totalItems: undefined,
        }),
      }

    case 'success':
      return {
        ...state,
        items: action.items.length ? [...state.items, ...action.items] : state.items,
        status: action.nextPageKey === undefined ? 'exhausted' : 'idle',
        error: null,
        failedPageKey: undefined,
        nextPageKey: action.nextPageKey,
        pageCount: state.pageCount + 1,
        totalItems: action.totalItems ?? state.totalItems,
        dataUpdatedAt: Date.now(),
      }

    case 'error':
      return {
        ...state,
        status: 'error',
        error: action.error,
        failedPageKey: action.pageKey,
        errorUpdatedAt: Date.now(),
      }
  }
}

export function getDefaultPaginatorState<TItem, TPageKey extends PageKey>(): PaginatorState<
  TItem,
  TPageKey
> {
  return {
    items: [],
    status: 'idle',
    error: null,
    failedPageKey: undefined,
    nextPageKey: undefined,
    pageCount: 0,
    totalItems: undefined,
    dataUpdatedAt: 0,
    errorUpdatedAt: 0,
  }
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

/** Derive the read-only projection from a state. */
export function createPaginatorResult<TItem, TPageKey extends PageKey>(
  state: PaginatorState<TItem, TPageKey>,
): PaginatorResult<TItem, TPageKey> {
  const { status } = state
  const isLoadingFirstPage = status === 'fetchingFirstPage'
  const isLoadingNextPage = status === 'fetchingNextPage'
  const isRefreshing = status === 'refreshing'

  return {
    items: state.items,
    status,
    isLoadingFirstPage,
    isLoadingNextPage,
    isRefreshing,
    isFetching: isLoadingFirstPage || isLoadingNextPage || isRefreshing,
    hasError: status === 'error',
    error: state.error,
    isExhausted: status === 'exhausted',
    hasNextPage: state.pageCount > 0 && (status === 'idle' || status === 'error'),
    nextPageKey: state.nextPageKey,
    failedPageKey: state.failedPageKey,
    pageCount: state.pageCount,
    totalItems: state.totalItems,
    dataUpdatedAt: state.dataUpdatedAt,
    errorUpdatedAt: state.errorUpdatedAt,
  }
}

// ---------------------------------------------------------------------------
// Paginator
// ---------------------------------------------------------------------------

export class Paginator<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>
  extends Removable<PaginatorListener<TItem, TPageKey>>
  implements PaginatorHandle
{
  readonly paginatorKey: PaginatorKey | undefined
  readonly paginatorHash: PaginatorHash | undefined

  options: PaginatorOptions<TItem, TResponse, TPageKey>
  state: PaginatorState<TItem, TPageKey>

  readonly #cache: PaginatorCacheInterface | undefined
  readonly #tracker: PageKeyTracker<TPageKey>
  #logger: Logger

  /** The request whose outcome will be applied. Anything else is stale. */
  #request?: PageRequest<TResponse, TPageKey>
  /** The command promise of #request, handed to coalesced callers. */
  #promise?: Promise<PaginatorResult<TItem, TPageKey>>
  #destroyed = false

  #result: PaginatorResult<TItem, TPageKey>
  #resultState: PaginatorState<TItem, TPageKey>

  constructor(config: PaginatorConfig<TItem, TResponse, TPageKey>) {
    super()
    this.#cache = config.cache
    this.paginatorKey = config.paginatorKey
    this.paginatorHash = config.paginatorHash
    this.options = config.options
    this.#tracker = new PageKeyTracker(config.options.firstPageKey)
    this.#logger = this.#createLogger()

    this.state = getDefaultPaginatorState()
    this.#resultState = this.state
    this.#result = createPaginatorResult(this.state)

    if (this.#cache) {
      this.gcTime = config.options.gcTime ?? DEFAULT_GC_TIME
      this.scheduleGc()
    }
  }

  // -------------------------------------------------------------------------
  // Options
  // -------------------------------------------------------------------------

  /**
   * Replace the options used by future requests. The first page key is fixed
   * at construction; a different one needs a different paginator.
   */
  setOptions(options: PaginatorOptions<TItem, TResponse, TPageKey>): void {
    const loggerChanged = options.logger !== this.options.logger
    this.options = options
    if (loggerChanged) this.#logger = this.#createLogger()
    if (this.#cache && options.gcTime !== undefined) {
      this.gcTime = options.gcTime
    }
  }

  // -------------------------------------------------------------------------
  // Read API
  // -------------------------------------------------------------------------

  /** The current projection. The same object is returned until state changes. */
  getResult(): PaginatorResult<TItem, TPageKey> {
    if (this.#resultState !== this.state) {
      this.#resultState = this.state
      this.#result = createPaginatorResult(this.state)
    }
    return this.#result
  }

  getStatus(): PaginatorStatus {
    return this.state.status
  }

  isFetching(): boolean {
    return this.getResult().isFetching
  }

  /** Keys requested since creation or the last refresh, in request order. */
  getPageKeyHistory(): ReadonlyArray<TPageKey> {
    return this.#tracker.history()
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /**
   * Fetch the first page. Coalesces with a request already in flight, and
   * does nothing once a first page has loaded (use refresh()).
   */
  loadFirstPage(): Promise<PaginatorResult<TItem, TPageKey>> {
    const inFlight = this.#coalesce('loadFirstPage')
    if (inFlight) return inFlight
    if (this.#destroyed || this.state.pageCount > 0) return this.#settled()
    return this.#fetch('first', this.#tracker.firstKey())
  }

  /**
   * Fetch the page after the last one loaded. From `error` it re-requests
   * the key that failed. Does nothing before the first page has loaded or
   * once the list is exhausted.
   */
  loadNextPage(): Promise<PaginatorResult<TItem, TPageKey>> {
    const inFlight = this.#coalesce('loadNextPage')
    if (inFlight) return inFlight
    if (this.#destroyed || this.state.status === 'exhausted' || this.state.pageCount === 0) {
      return this.#settled()
    }
    const pageKey = this.#tracker.nextKeyToFetch()
    if (pageKey === undefined) return this.#settled()
    return this.#fetch('next', pageKey)
  }

  /**
   * Cancel any in-flight request, drop every loaded item and key, and fetch
   * the first page again.
   */
  refresh(): Promise<PaginatorResult<TItem, TPageKey>> {
    if (this.#destroyed) return this.#settled()
    this.#cancelActiveRequest()
    this.#tracker.reset()
    return this.#fetch('refresh', this.#tracker.firstKey())
  }

  /** Re-issue the request that failed. Does nothing unless in `error`. */
  retry(): Promise<PaginatorResult<TItem, TPageKey>> {
    const { status, failedPageKey, pageCount } = this.state
    if (this.#destroyed || status !== 'error' || failedPageKey === undefined) {
      return this.#settled()
    }
    return this.#fetch(pageCount === 0 ? 'first' : 'next', failedPageKey)
  }

  // -------------------------------------------------------------------------
  // Subscribable hooks
  // -------------------------------------------------------------------------

  protected override onSubscribe(): void {
    this.clearGcTimeout()
  }

  protected override onUnsubscribe(): void {
    if (!this.hasListeners() && this.#cache) {
      this.scheduleGc()
    }
  }

  // -------------------------------------------------------------------------
  // Removable contract
  // -------------------------------------------------------------------------

  /** Cancel any in-flight request and the collection timer. */
  override destroy(): void {
    super.destroy()
    this.#destroyed = true
    this.#cancelActiveRequest()
  }

  protected optionalRemove(): void {
    if (!this.hasListeners() && !this.isFetching()) {
      this.#cache?.remove(this)
    }
  }

  // -------------------------------------------------------------------------
  // Request lifecycle
  // -------------------------------------------------------------------------

  #coalesce(command: string): Promise<PaginatorResult<TItem, TPageKey>> | undefined {
    if (!this.isFetching() || !this.#promise) return undefined
    this.#logger.debug({ command, status: this.state.status }, 'Request already in flight')
    return this.#promise
  }

  #settled(): Promise<PaginatorResult<TItem, TPageKey>> {
    return Promise.resolve(this.getResult())
  }

  #fetch(mode: FetchMode, pageKey: TPageKey): Promise<PaginatorResult<TItem, TPageKey>> {
    this.#tracker.recordRequest(pageKey)

    const request = new PageRequest<TResponse, TPageKey>({
      pageKey,
      fetchPage: this.options.fetchPage,
      meta: this.options.meta,
      timeout: this.options.timeout,
    })
    this.#request = request

    this.#logger.debug({ pageKey, mode }, 'Requesting page')
    this.#dispatch({ type: 'fetch', mode })

    const promise = request.promise
      .then(
        (response) => this.#onResponse(request, response),
        (failure: unknown) => this.#onFailure(request, failure),
      )
      .then(() => {
        // Collection skipped this paginator while it was fetching.
        if (this.#cache && !this.#destroyed && !this.hasListeners() && !this.isFetching()) {
          this.scheduleGc()
        }
        return this.getResult()
      })
    this.#promise = promise
    return promise
  }

  /** A response applies only to the active request for the newest requested key. */
  #isCurrent(request: PageRequest<TResponse, TPageKey>): boolean {
    return this.#request === request && this.#tracker.tip() === request.pageKey
  }

  #onResponse(request: PageRequest<TResponse, TPageKey>, response: TResponse): void {
    if (!this.#isCurrent(request)) {
      this.#logger.warn({ pageKey: request.pageKey }, 'Discarding stale page response')
      return
    }

    let page: PageResult<TItem, TPageKey>
    let nextPageKey: TPageKey | undefined
    try {
      page = this.options.parseResponse(response, request.pageKey)
      nextPageKey = this.#tracker.nextKeyAfter(
        request.pageKey,
        page,
        this.state.items.length + page.items.length,
      )
    } catch (failure) {
      this.#onFailure(request, failure)
      return
    }

    this.#request = undefined
    this.#tracker.recordMapping(request.pageKey, nextPageKey)
    this.#dispatch({
      type: 'success',
      items: page.items,
      nextPageKey,
      totalItems: page.totalItems,
    })

    this.#logger.debug(
      { pageKey: request.pageKey, nextPageKey, itemCount: page.items.length },
      'Page loaded',
    )
    if (nextPageKey === undefined) {
      this.#logger.info(
        { pageCount: this.state.pageCount, itemCount: this.state.items.length },
        'Reached the last page',
      )
    }
  }

  #onFailure(request: PageRequest<TResponse, TPageKey>, failure: unknown): void {
    if (!this.#isCurrent(request)) {
      this.#logger.debug(
        { pageKey: request.pageKey, requestStatus: request.status() },
        'Discarding failure of a superseded request',
      )
      return
    }

    this.#request = undefined
    const error = this.#classify(failure)
    this.#dispatch({ type: 'error', error, pageKey: request.pageKey })

    this.#logger.warn(
      { pageKey: request.pageKey, kind: error.kind, statusCode: error.statusCode, err: failure },
      'Page request failed',
    )
  }

  /** Run the configured classifier, falling back to the default if it throws. */
  #classify(failure: unknown): ClassifiedError {
    const classifier: ErrorClassifier = this.options.classifyError ?? classifyError
    try {
      // Re-run through the default classifier so a custom result keeps the invariants.
      return classifyError(classifier(failure))
    } catch (classifierFailure) {
      this.#logger.error({ err: classifierFailure }, 'Custom error classifier threw')
      return classifyError(failure)
    }
  }

  #cancelActiveRequest(): void {
    const request = this.#request
    if (!request) return
    this.#request = undefined
    request.cancel()
  }

  #createLogger(): Logger {
    const base = this.options.logger ?? createLogger('paginator')
    return this.paginatorHash === undefined ? base : base.child({ paginatorHash: this.paginatorHash })
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  /**
   * Apply an action, then notify listeners and the cache inside one batch.
   * A listener that throws is logged and does not stop the others.
   */
  #dispatch(action: PaginatorAction<TItem, TPageKey>): void {
    this.state = paginatorReducer(this.state, action)

    notifyManager.batch(() => {
      const result = this.getResult()
      this.listeners.forEach((listener) => {
        try {
          listener(result)
        } catch (error) {
          this.#logger.error({ err: error }, 'Paginator listener threw')
        }
      })
      try {
        this.#cache?.notify({ type: 'updated', paginator: this, actionType: action.type })
      } catch (error) {
        this.#logger.error({ err: error }, 'Paginator cache notification threw')
      }
    })
  }
}

/** Create a standalone paginator, not owned by any cache. */
export function createPaginator<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
  options: PaginatorOptions<TItem, TResponse, TPageKey>,
): Paginator<TItem, TResponse, TPageKey> {
  return new Paginator({ options })
}
