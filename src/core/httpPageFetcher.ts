/**
 * httpPageFetcher.ts
 *
 * A FetchPageFunction over the Fetch API for the three common pagination
 * strategies. The page key becomes a query parameter:
 *
 *   offset  ?skip=<key>&limit=<limit>
 *   page    ?page=<key>&limit=<limit>
 *   cursor  ?limit=<limit>&cursor=<key>   (cursor omitted for a null key)
 *
 * A non-2xx response is thrown as HttpResponseError carrying the decoded
 * body, which is what the error classifier reads status and field errors from.
 */

import type { FetchPageFunction, PageKey } from './types'
import { HttpResponseError } from './errors'
import { createLogger } from './logger'

const logger = createLogger('httpPageFetcher')

export type PaginationStrategy = 'offset' | 'page' | 'cursor'

export type QueryParamValue = string | number | boolean

/** Request parameters for one page. Exactly one of skip, page or cursor applies. */
export interface PageParams {
  limit: number
  skip?: number
  page?: number
  cursor?: string
  extraParams?: Readonly<Record<string, QueryParamValue>>
}

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

/** Query parameters in a fixed order: page, skip, limit, cursor, then extras. */
export function buildPageQuery(params: PageParams): URLSearchParams {
  const query = new URLSearchParams()
  if (params.page !== undefined) query.set('page', String(params.page))
  if (params.skip !== undefined) query.set('skip', String(params.skip))
  query.set('limit', String(params.limit))
  if (params.cursor !== undefined) query.set('cursor', params.cursor)
  for (const [key, value] of Object.entries(params.extraParams ?? {})) {
    query.set(key, String(value))
  }
  return query
}

/**
 * Params for the page after `params`. Offset and page strategies advance by
 * arithmetic; a cursor only comes from the server, so cursor params are
 * returned unchanged.
 */
export function nextPageParams(params: PageParams): PageParams {
  if (params.page !== undefined) return { ...params, page: params.page + 1 }
  if (params.skip !== undefined) return { ...params, skip: params.skip + params.limit }
  return params
}

function toInteger(pageKey: PageKey, strategy: PaginationStrategy): number {
  const value = typeof pageKey === 'number' ? pageKey : Number(pageKey)
  if (pageKey === null || !Number.isInteger(value)) {
    throw new TypeError(`Page key ${String(pageKey)} is not a valid ${strategy} key`)
  }
  return value
}

/** Translate a page key into request params for `strategy`. */
export function pageParamsFor(
  strategy: PaginationStrategy,
  pageKey: PageKey,
  limit: number,
  extraParams?: Readonly<Record<string, QueryParamValue>>,
): PageParams {
  switch (strategy) {
    case 'offset':
      return { skip: toInteger(pageKey, strategy), limit, extraParams }
    case 'page':
      return { page: toInteger(pageKey, strategy), limit, extraParams }
    case 'cursor':
      return { cursor: pageKey === null ? undefined : String(pageKey), limit, extraParams }
  }
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export interface HttpPageFetcherOptions {
  url: string
  strategy: PaginationStrategy
  /** Page size sent as `limit`. */
  limit: number
  /** Extra query parameters sent with every page. */
  params?: Readonly<Record<string, QueryParamValue>>
  headers?: Readonly<Record<string, string>>
  /** Fetch implementation; defaults to the global fetch. */
  fetch?: typeof fetch
}

/** JSON when the body parses, the raw text otherwise, null when empty. */
async function readResponseBody(response: Response): Promise<unknown> {
  const text = await response.text()
  if (!text) return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function withQuery(url: string, query: URLSearchParams): string {
  return `${url}${url.includes('?') ? '&' : '?'}${query.toString()}`
}

export function createHttpPageFetcher(options: HttpPageFetcherOptions): FetchPageFunction<unknown> {
  const { url, strategy, limit, params, headers } = options

  return async (pageKey, { signal }) => {
    const fetchImpl = options.fetch ?? globalThis.fetch
    const target = withQuery(url, buildPageQuery(pageParamsFor(strategy, pageKey, limit, params)))

    logger.debug({ url: target }, 'GET page')
    const response = await fetchImpl(target, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
      signal,
    })
    const body = await readResponseBody(response)

    if (!response.ok) {
      throw new HttpResponseError(response.status, {
        statusText: response.statusText,
        body,
        url: target,
      })
    }
    return body
  }
}
