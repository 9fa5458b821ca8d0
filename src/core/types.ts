/**
 * types.ts
 *
 * Single source of truth for the TypeScript types shared across the
 * paginated-fetch coordinator. No runtime code lives here.
 */

import type { Logger } from 'pino'

// ---------------------------------------------------------------------------
// Page keys
// ---------------------------------------------------------------------------

/**
 * An opaque value identifying a page request: an offset, a page number, a
 * cursor string, or null (commonly the first key of cursor-based APIs).
 *
 * Only the caller-supplied parser interprets it. When returned as a *next*
 * key, null and undefined both mean "no further page".
 */
export type PageKey = string | number | null

/** A stable, serializable array identifying a paginator inside a PaginatorCache. */
export type PaginatorKey = ReadonlyArray<unknown>

/** A stable string representation of a PaginatorKey, produced by hashPaginatorKey(). */
export type PaginatorHash = string

// ---------------------------------------------------------------------------
// Page results
// ---------------------------------------------------------------------------

/**
 * What a response parser extracts from one raw page response.
 *
 * If `isLastPage` is true, `nextKey` is treated as absent regardless of its
 * literal value. If `isLastPage` is omitted it is derived from `nextKey`.
 */
export interface PageResult<TItem, TPageKey extends PageKey = PageKey> {
  /** The items of this page, in the order the server returned them. */
  items: ReadonlyArray<TItem>
  /** The key to request next, or null / undefined when there is none. */
  nextKey?: TPageKey | null
  /** Explicit last-page flag. */
  isLastPage?: boolean
  /** Total number of items across all pages, when the API reports it. */
  totalItems?: number
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/**
 * The coordinator's state machine.
 *
 * - idle              : ready for loadNextPage (or loadFirstPage when nothing loaded)
 * - fetchingFirstPage : the first page is in flight
 * - fetchingNextPage  : a subsequent page is in flight
 * - refreshing        : the first page is in flight after refresh()
 * - error             : the last fetch failed; retry() re-issues it
 * - exhausted         : no further pages until refresh()
 */
export type PaginatorStatus =
  | 'idle'
  | 'fetchingFirstPage'
  | 'fetchingNextPage'
  | 'refreshing'
  | 'error'
  | 'exhausted'

/** Which command started a request. */
export type FetchMode = 'first' | 'next' | 'refresh'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** The closed error taxonomy. */
export type ErrorKind =
  | 'noConnectivity'
  | 'serverFault'
  | 'clientFault'
  | 'validationFailure'
  | 'timeout'
  | 'cancelled'
  | 'unclassified'

/** Field name → ordered validation messages for that field. */
export type FieldErrors = Readonly<Record<string, ReadonlyArray<string>>>

/**
 * A failure mapped into the closed taxonomy. Immutable once constructed.
 *
 * `fieldErrors` is present if and only if `kind === 'validationFailure'`.
 */
export interface ClassifiedError {
  readonly kind: ErrorKind
  readonly message: string
  readonly statusCode?: number
  readonly fieldErrors?: FieldErrors
  /** The original failure, kept for diagnostics. */
  readonly rawCause: unknown
}

/** Maps any failure to a ClassifiedError. Must be total and never throw. */
export type ErrorClassifier = (failure: unknown) => ClassifiedError

// ---------------------------------------------------------------------------
// Fetch function and parser
// ---------------------------------------------------------------------------

/** Arbitrary key-value metadata handed to every fetch call. */
export type PaginatorMeta = Record<string, unknown>

/**
 * The second argument of every fetch call. Forward `signal` to fetch() / axios
 * so refresh(), destroy() and timeouts cancel the underlying request.
 */
export interface PageFetchContext {
  signal: AbortSignal
  meta: PaginatorMeta | undefined
}

/**
 * Fetches one raw page. All failures must surface through the returned
 * promise; a synchronous throw is still caught and classified.
 */
export type FetchPageFunction<TResponse, TPageKey extends PageKey = PageKey> = (
  pageKey: TPageKey,
  context: PageFetchContext,
) => Promise<TResponse>

/** Pure function turning a raw response into a PageResult. */
export type ParseResponseFunction<
  TItem,
  TResponse,
  TPageKey extends PageKey = PageKey,
> = (response: TResponse, requestedKey: TPageKey) => PageResult<TItem, TPageKey>

// ---------------------------------------------------------------------------
// Paginator options
// ---------------------------------------------------------------------------

export interface PaginatorOptions<
  TItem,
  TResponse = unknown,
  TPageKey extends PageKey = PageKey,
> {
  /** Fetches one raw page for a key. Required. */
  fetchPage: FetchPageFunction<TResponse, TPageKey>
  /** Extracts items and the next key from a raw page. Required. */
  parseResponse: ParseResponseFunction<TItem, TResponse, TPageKey>
  /** The key of the first page (0, 1, null, a cursor…). Required. */
  firstPageKey: TPageKey
  /** Replaces the default classifier. */
  classifyError?: ErrorClassifier
  /** Milliseconds before an unsettled request is aborted as a timeout. */
  timeout?: number
  /**
   * How long (ms) a cached paginator with no listeners stays in its
   * PaginatorCache. Ignored for standalone paginators.
   */
  gcTime?: number
  /** Passed through to every fetch call. */
  meta?: PaginatorMeta
  /** Logger to use instead of the module logger. */
  logger?: Logger
}

/** Options for a paginator that lives in a PaginatorCache. */
export interface CachedPaginatorOptions<
  TItem,
  TResponse = unknown,
  TPageKey extends PageKey = PageKey,
> extends PaginatorOptions<TItem, TResponse, TPageKey> {
  /** Identifies the paginator inside the cache. Required. */
  paginatorKey: PaginatorKey
}

/** Options every paginator created through a PaginatorClient inherits. */
export interface DefaultPaginatorOptions {
  timeout?: number
  gcTime?: number
  classifyError?: ErrorClassifier
  logger?: Logger
}

// ---------------------------------------------------------------------------
// State and projection
// ---------------------------------------------------------------------------

/** The mutable state of one paginator. Replaced, never mutated in place. */
export interface PaginatorState<TItem, TPageKey extends PageKey = PageKey> {
  /** Accumulated items: page-arrival order, then in-page order. */
  items: ReadonlyArray<TItem>
  status: PaginatorStatus
  /** The classified failure of the last fetch, or null. */
  error: ClassifiedError | null
  /** The key whose fetch produced `error`. */
  failedPageKey: TPageKey | undefined
  /** The key that will be requested by the next loadNextPage(). */
  nextPageKey: TPageKey | undefined
  /** Number of pages successfully applied since creation or the last refresh. */
  pageCount: number
  /** The most recent totalItems reported by the parser. */
  totalItems: number | undefined
  /** Unix timestamp (ms) of the most recent applied page. */
  dataUpdatedAt: number
  /** Unix timestamp (ms) of the most recent failure. */
  errorUpdatedAt: number
}

/**
 * Read-only snapshot derived from PaginatorState. Recomputed on demand so it
 * can never diverge from the state it describes.
 */
export interface PaginatorResult<TItem, TPageKey extends PageKey = PageKey> {
  items: ReadonlyArray<TItem>
  status: PaginatorStatus
  isLoadingFirstPage: boolean
  isLoadingNextPage: boolean
  isRefreshing: boolean
  /** True while any request is in flight. */
  isFetching: boolean
  hasError: boolean
  error: ClassifiedError | null
  isExhausted: boolean
  /** True when loadNextPage() would issue a request. */
  hasNextPage: boolean
  nextPageKey: TPageKey | undefined
  failedPageKey: TPageKey | undefined
  pageCount: number
  totalItems: number | undefined
  dataUpdatedAt: number
  errorUpdatedAt: number
}

/** Callback signature for paginator.subscribe(). */
export type PaginatorListener<TItem, TPageKey extends PageKey = PageKey> = (
  result: PaginatorResult<TItem, TPageKey>,
) => void

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/** Criteria used by PaginatorCache.findAll() and the client's bulk methods. */
export interface PaginatorFilters {
  /** Prefix-match (or exact-match with `exact`) against the paginator key. */
  paginatorKey?: PaginatorKey
  exact?: boolean
  /** Only paginators currently in this status. */
  status?: PaginatorStatus
  /** Arbitrary extra check. */
  predicate?: (paginator: {
    paginatorKey: PaginatorKey | undefined
    hasListeners(): boolean
  }) => boolean
}
