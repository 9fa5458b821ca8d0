import { describe, it, expect, vi } from 'vitest'
import pino from 'pino'
import { z, ZodError } from 'zod'
import {
  Paginator,
  createPaginator,
  createPaginatorResult,
  getDefaultPaginatorState,
  paginatorReducer,
} from '../src/core/paginator'
import type { PaginatorCacheInterface } from '../src/core/paginator'
import { offsetPageParser, cursorPageParser } from '../src/core/pageParsers'
import { CancelledError, HttpResponseError, createClassifiedError } from '../src/core/errors'
import type {
  FetchPageFunction,
  PaginatorOptions,
  PaginatorStatus,
  PaginatorState,
} from '../src/core/types'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

interface Product {
  id: number
  title: string
}

const productSchema = z.object({ id: z.number(), title: z.string() })

const catalog: Product[] = Array.from({ length: 45 }, (_, index) => ({
  id: index + 1,
  title: `Product ${index + 1}`,
}))

/** An offset envelope: `limit` is the size of the page actually returned. */
function productPage(skip: number, limit = 20) {
  const products = catalog.slice(skip, skip + limit)
  return { products, total: catalog.length, skip, limit: products.length }
}

const parseProducts = offsetPageParser({ itemsKey: 'products', itemSchema: productSchema })

function productOptions(
  overrides: Partial<PaginatorOptions<Product, unknown, number>> = {},
): PaginatorOptions<Product, unknown, number> {
  return {
    fetchPage: (skip) => Promise.resolve(productPage(skip)),
    parseResponse: parseProducts,
    firstPageKey: 0,
    ...overrides,
  }
}

interface PendingCall {
  pageKey: number
  signal: AbortSignal
  resolve: (response: unknown) => void
  reject: (reason: unknown) => void
}

/** A fetcher whose calls stay pending until the test settles them. */
function controlledFetch() {
  const calls: PendingCall[] = []
  const fetchPage: FetchPageFunction<unknown, number> = (pageKey, { signal }) =>
    new Promise((resolve, reject) => {
      calls.push({ pageKey, signal, resolve, reject })
    })
  const call = (index: number): PendingCall => {
    const pending = calls[index]
    if (!pending) throw new Error(`fetchPage was not called ${index + 1} times`)
    return pending
  }
  return { calls, call, fetchPage }
}

function ids(items: ReadonlyArray<Product>): number[] {
  return items.map((item) => item.id)
}

// ---------------------------------------------------------------------------
// Reducer and projection
// ---------------------------------------------------------------------------

describe('paginatorReducer', () => {
  const loaded: PaginatorState<string, number> = {
    ...getDefaultPaginatorState<string, number>(),
    items: ['a', 'b'],
    nextPageKey: 2,
    pageCount: 1,
    totalItems: 4,
    dataUpdatedAt: 1,
  }

  it('maps each fetch mode to its status', () => {
    expect(paginatorReducer(loaded, { type: 'fetch', mode: 'first' }).status).toBe(
      'fetchingFirstPage',
    )
    expect(paginatorReducer(loaded, { type: 'fetch', mode: 'next' }).status).toBe(
      'fetchingNextPage',
    )
    expect(paginatorReducer(loaded, { type: 'fetch', mode: 'refresh' }).status).toBe('refreshing')
  })

  it('keeps items on a next-page fetch and drops them on refresh', () => {
    expect(paginatorReducer(loaded, { type: 'fetch', mode: 'next' }).items).toEqual(['a', 'b'])

    const refreshing = paginatorReducer(loaded, { type: 'fetch', mode: 'refresh' })
    expect(refreshing.items).toEqual([])
    expect(refreshing.pageCount).toBe(0)
    expect(refreshing.nextPageKey).toBeUndefined()
    expect(refreshing.totalItems).toBeUndefined()
  })

  it('appends items and marks exhaustion when there is no next key', () => {
    const next = paginatorReducer(loaded, {
      type: 'success',
      items: ['c', 'd'],
      nextPageKey: undefined,
      totalItems: undefined,
    })
    expect(next.items).toEqual(['a', 'b', 'c', 'd'])
    expect(next.status).toBe('exhausted')
    expect(next.pageCount).toBe(2)
    expect(next.totalItems).toBe(4)
  })

  it('records the failed key and leaves items alone on error', () => {
    const error = createClassifiedError({ kind: 'timeout', message: 'slow', rawCause: null })
    const next = paginatorReducer(loaded, { type: 'error', error, pageKey: 2 })
    expect(next.status).toBe('error')
    expect(next.error).toBe(error)
    expect(next.failedPageKey).toBe(2)
    expect(next.items).toBe(loaded.items)
  })

  it('never mutates the previous state', () => {
    const before = { ...loaded }
    paginatorReducer(loaded, { type: 'fetch', mode: 'refresh' })
    expect(loaded).toEqual(before)
  })
})

describe('createPaginatorResult', () => {
  it('offers a next page only once something has loaded', () => {
    const initial = createPaginatorResult(getDefaultPaginatorState<string, number>())
    expect(initial.hasNextPage).toBe(false)
    expect(initial.isFetching).toBe(false)

    const loaded = createPaginatorResult<string, number>({
      ...getDefaultPaginatorState<string, number>(),
      pageCount: 1,
    })
    expect(loaded.hasNextPage).toBe(true)
  })

  it('derives every flag from the status', () => {
    const statuses: PaginatorStatus[] = [
      'idle',
      'fetchingFirstPage',
      'fetchingNextPage',
      'refreshing',
      'error',
      'exhausted',
    ]
    const flags = statuses.map((status) => {
      const result = createPaginatorResult<string, number>({
        ...getDefaultPaginatorState<string, number>(),
        status,
        pageCount: 1,
      })
      return [result.isFetching, result.hasError, result.isExhausted, result.hasNextPage]
    })
    expect(flags).toEqual([
      [false, false, false, true],
      [true, false, false, false],
      [true, false, false, false],
      [true, false, false, false],
      [false, true, false, true],
      [false, false, true, false],
    ])
  })
})

// ---------------------------------------------------------------------------
// Loading pages
// ---------------------------------------------------------------------------

describe('Paginator: loading', () => {
  it('starts idle and empty', () => {
    const paginator = createPaginator(productOptions())
    const result = paginator.getResult()

    expect(result.status).toBe('idle')
    expect(result.items).toEqual([])
    expect(result.pageCount).toBe(0)
    expect(result.hasNextPage).toBe(false)
  })

  it('walks 45 items in pages of 20 until exhausted', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = await paginator.loadFirstPage()
    expect(first.items).toHaveLength(20)
    expect(first.status).toBe('idle')
    expect(first.nextPageKey).toBe(20)
    expect(first.totalItems).toBe(45)
    expect(first.hasNextPage).toBe(true)

    const second = await paginator.loadNextPage()
    expect(second.items).toHaveLength(40)
    expect(second.nextPageKey).toBe(40)

    const third = await paginator.loadNextPage()
    expect(third.items).toHaveLength(45)
    expect(third.status).toBe('exhausted')
    expect(third.isExhausted).toBe(true)
    expect(third.hasNextPage).toBe(false)
    expect(third.nextPageKey).toBeUndefined()
    expect(third.pageCount).toBe(3)

    expect(ids(third.items)).toEqual(catalog.map((product) => product.id))
    expect(fetchPage.mock.calls.map(([skip]) => skip)).toEqual([0, 20, 40])
    expect(paginator.getPageKeyHistory()).toEqual([0, 20, 40])
  })

  it('does nothing once exhausted', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip, 50)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    const result = await paginator.loadNextPage()

    expect(result.status).toBe('exhausted')
    expect(fetchPage).toHaveBeenCalledTimes(1)
  })

  it('exhausts on an empty first page', async () => {
    const paginator = createPaginator(
      productOptions({ fetchPage: () => Promise.resolve(productPage(100)) }),
    )

    const result = await paginator.loadFirstPage()

    expect(result.items).toEqual([])
    expect(result.status).toBe('exhausted')
    expect(result.pageCount).toBe(1)
  })

  it('ignores loadNextPage before the first page', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    const result = await paginator.loadNextPage()

    expect(result.status).toBe('idle')
    expect(fetchPage).not.toHaveBeenCalled()
  })

  it('ignores loadFirstPage once a page has loaded', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    const result = await paginator.loadFirstPage()

    expect(result.items).toHaveLength(20)
    expect(fetchPage).toHaveBeenCalledTimes(1)
  })

  it('reports fetching statuses while a request is in flight', async () => {
    const { call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    expect(paginator.getStatus()).toBe('fetchingFirstPage')
    expect(paginator.getResult().isLoadingFirstPage).toBe(true)
    call(0).resolve(productPage(0))
    await first

    const next = paginator.loadNextPage()
    expect(paginator.getStatus()).toBe('fetchingNextPage')
    expect(paginator.getResult().isLoadingNextPage).toBe(true)
    expect(paginator.getResult().items).toHaveLength(20)
    call(1).resolve(productPage(20))
    await next

    expect(paginator.getStatus()).toBe('idle')
  })

  it('follows server cursors from a null first key', async () => {
    const responses = new Map<string | null, unknown>([
      [null, { data: [{ id: 1, title: 'a' }], pagination: { next_cursor: 'c2', has_more: true } }],
      ['c2', { data: [{ id: 2, title: 'b' }], pagination: { next_cursor: null, has_more: false } }],
    ])
    const fetchPage = vi.fn((cursor: string | null) => Promise.resolve(responses.get(cursor)))
    const paginator = createPaginator<Product, unknown, string | null>({
      fetchPage,
      parseResponse: cursorPageParser({ itemSchema: productSchema }),
      firstPageKey: null,
    })

    await paginator.loadFirstPage()
    const result = await paginator.loadNextPage()

    expect(ids(result.items)).toEqual([1, 2])
    expect(result.status).toBe('exhausted')
    expect(paginator.getPageKeyHistory()).toEqual([null, 'c2'])
  })

  it('passes meta to every fetch', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage, meta: { tenant: 'test' } }))

    await paginator.loadFirstPage()

    expect(fetchPage.mock.calls[0]).toEqual([0, expect.objectContaining({ meta: { tenant: 'test' } })])
  })
})

// ---------------------------------------------------------------------------
// Coalescing
// ---------------------------------------------------------------------------

describe('Paginator: coalescing', () => {
  it('shares one request between concurrent loadNextPage calls', async () => {
    const { calls, call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    call(0).resolve(productPage(0))
    await first

    const a = paginator.loadNextPage()
    const b = paginator.loadNextPage()
    expect(b).toBe(a)
    expect(calls).toHaveLength(2)

    call(1).resolve(productPage(20))
    const [resultA, resultB] = await Promise.all([a, b])

    expect(resultA).toBe(resultB)
    expect(ids(resultA.items)).toEqual(catalog.slice(0, 40).map((product) => product.id))
  })

  it('shares one request between concurrent loadFirstPage calls', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    await Promise.all([paginator.loadFirstPage(), paginator.loadFirstPage()])

    expect(fetchPage).toHaveBeenCalledTimes(1)
    expect(paginator.getResult().items).toHaveLength(20)
  })

  it('returns the first-page request to loadNextPage while it is in flight', async () => {
    const { calls, call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    const next = paginator.loadNextPage()
    expect(next).toBe(first)

    call(0).resolve(productPage(0))
    await next
    expect(calls).toHaveLength(1)
  })
})

// ---------------------------------------------------------------------------
// Failures and retry
// ---------------------------------------------------------------------------

describe('Paginator: failures', () => {
  it('keeps loaded items and records the failed key', async () => {
    const fetchPage = vi.fn((skip: number) =>
      skip === 20 ? Promise.reject(new HttpResponseError(503)) : Promise.resolve(productPage(skip)),
    )
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    const result = await paginator.loadNextPage()

    expect(result.status).toBe('error')
    expect(result.hasError).toBe(true)
    expect(result.error?.kind).toBe('serverFault')
    expect(result.error?.statusCode).toBe(503)
    expect(result.error?.message).toBe('Service unavailable. Please try again later.')
    expect(result.failedPageKey).toBe(20)
    expect(result.items).toHaveLength(20)
    expect(result.hasNextPage).toBe(true)
  })

  it('retries the failed key and continues from there', async () => {
    let failNext = true
    const fetchPage = vi.fn((skip: number) => {
      if (skip === 20 && failNext) {
        failNext = false
        return Promise.reject(new TypeError('Failed to fetch'))
      }
      return Promise.resolve(productPage(skip))
    })
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    const failed = await paginator.loadNextPage()
    expect(failed.error?.kind).toBe('noConnectivity')

    const retried = await paginator.retry()

    expect(retried.status).toBe('idle')
    expect(retried.error).toBeNull()
    expect(retried.failedPageKey).toBeUndefined()
    expect(retried.items).toHaveLength(40)
    expect(fetchPage.mock.calls.map(([skip]) => skip)).toEqual([0, 20, 20])
    expect(paginator.getPageKeyHistory()).toEqual([0, 20])
  })

  it('retries a failed first page as a first-page load', async () => {
    const { call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    call(0).reject(new HttpResponseError(500))
    await first
    expect(paginator.getResult().failedPageKey).toBe(0)

    const retry = paginator.retry()
    expect(paginator.getStatus()).toBe('fetchingFirstPage')
    expect(call(1).pageKey).toBe(0)

    call(1).resolve(productPage(0))
    expect((await retry).items).toHaveLength(20)
  })

  it('re-requests the failed key from loadNextPage', async () => {
    const fetchPage = vi.fn((skip: number) =>
      skip === 20 ? Promise.reject(new HttpResponseError(502)) : Promise.resolve(productPage(skip)),
    )
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    await paginator.loadNextPage()
    await paginator.loadNextPage()

    expect(fetchPage.mock.calls.map(([skip]) => skip)).toEqual([0, 20, 20])
  })

  it('ignores retry unless in error', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))

    await paginator.loadFirstPage()
    await paginator.retry()

    expect(fetchPage).toHaveBeenCalledTimes(1)
  })

  it('times out a request that never settles', async () => {
    vi.useFakeTimers()
    const { call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage, timeout: 1000 }))

    const pending = paginator.loadFirstPage()
    vi.advanceTimersByTime(1000)
    const result = await pending

    expect(result.status).toBe('error')
    expect(result.error?.kind).toBe('timeout')
    expect(result.error?.message).toBe('Request timed out. Please try again.')
    expect(result.failedPageKey).toBe(0)
    expect(call(0).signal.aborted).toBe(true)
  })

  it('classifies a malformed response as unclassified', async () => {
    const paginator = createPaginator(
      productOptions({ fetchPage: () => Promise.resolve({ products: 'not a list' }) }),
    )

    const result = await paginator.loadFirstPage()

    expect(result.status).toBe('error')
    expect(result.error?.kind).toBe('unclassified')
    expect(result.error?.rawCause).toBeInstanceOf(ZodError)
    expect(result.items).toEqual([])
    expect(result.pageCount).toBe(0)
  })

  it('uses the message of a throwing parser', async () => {
    const paginator = createPaginator<Product, unknown, number>({
      fetchPage: () => Promise.resolve({}),
      parseResponse: () => {
        throw new Error('bad envelope')
      },
      firstPageKey: 0,
    })

    const result = await paginator.loadFirstPage()

    expect(result.error?.kind).toBe('unclassified')
    expect(result.error?.message).toBe('bad envelope')
  })

  it('uses a custom classifier', async () => {
    const paginator = createPaginator(
      productOptions({
        fetchPage: () => Promise.reject(new Error('teapot')),
        classifyError: (failure) =>
          createClassifiedError({ kind: 'clientFault', message: 'custom', rawCause: failure }),
      }),
    )

    const result = await paginator.loadFirstPage()

    expect(result.error?.kind).toBe('clientFault')
    expect(result.error?.message).toBe('custom')
  })

  it('fills in what a custom classifier leaves out', async () => {
    const paginator = createPaginator(
      productOptions({
        fetchPage: () => Promise.reject(new Error('teapot')),
        classifyError: (failure) => ({
          kind: 'serverFault',
          message: '',
          rawCause: failure,
          fieldErrors: { title: ['required'] },
        }),
      }),
    )

    const result = await paginator.loadFirstPage()

    expect(result.error?.kind).toBe('serverFault')
    expect(result.error?.message).toBe('Server error occurred. Please try again later.')
    expect(result.error?.fieldErrors).toBeUndefined()
    expect(Object.isFrozen(result.error)).toBe(true)
  })

  it('falls back to the default classifier when a custom one throws', async () => {
    const paginator = createPaginator(
      productOptions({
        fetchPage: () => Promise.reject(new HttpResponseError(503)),
        classifyError: () => {
          throw new Error('broken classifier')
        },
      }),
    )

    const result = await paginator.loadFirstPage()

    expect(result.error?.kind).toBe('serverFault')
  })

  it('logs a failed page at warn level', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) })
    const paginator = createPaginator(
      productOptions({ fetchPage: () => Promise.reject(new HttpResponseError(503)), logger }),
    )

    await paginator.loadFirstPage()
    const entries: unknown[] = lines.map((line) => JSON.parse(line))

    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 40,
        msg: 'Page request failed',
        pageKey: 0,
        kind: 'serverFault',
        statusCode: 503,
      }),
    )
  })
})

// ---------------------------------------------------------------------------
// Refresh
// ---------------------------------------------------------------------------

describe('Paginator: refresh', () => {
  it('drops loaded items and starts over', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip)))
    const paginator = createPaginator(productOptions({ fetchPage }))
    await paginator.loadFirstPage()
    await paginator.loadNextPage()

    const pending = paginator.refresh()
    expect(paginator.getStatus()).toBe('refreshing')
    expect(paginator.getResult().isRefreshing).toBe(true)
    expect(paginator.getResult().items).toEqual([])

    const result = await pending
    expect(result.items).toHaveLength(20)
    expect(result.pageCount).toBe(1)
    expect(result.nextPageKey).toBe(20)
    expect(paginator.getPageKeyHistory()).toEqual([0])
  })

  it('refreshes an exhausted list', async () => {
    const fetchPage = vi.fn((skip: number) => Promise.resolve(productPage(skip, 50)))
    const paginator = createPaginator(productOptions({ fetchPage }))
    await paginator.loadFirstPage()

    const result = await paginator.refresh()

    expect(result.status).toBe('exhausted')
    expect(result.items).toHaveLength(45)
    expect(fetchPage).toHaveBeenCalledTimes(2)
  })

  it('clears an error', async () => {
    let fail = true
    const paginator = createPaginator(
      productOptions({
        fetchPage: (skip) =>
          fail ? Promise.reject(new HttpResponseError(500)) : Promise.resolve(productPage(skip)),
      }),
    )
    await paginator.loadFirstPage()
    fail = false

    const pending = paginator.refresh()
    expect(paginator.getResult().error).toBeNull()

    const result = await pending
    expect(result.status).toBe('idle')
  })

  it('cancels the in-flight request and discards its late response', async () => {
    const { call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    call(0).resolve(productPage(0))
    await first

    const next = paginator.loadNextPage()
    const refreshed = paginator.refresh()

    expect(call(1).signal.aborted).toBe(true)
    call(1).resolve(productPage(20))
    expect((await next).status).toBe('refreshing')

    call(2).resolve(productPage(0))
    const result = await refreshed

    expect(ids(result.items)).toEqual(catalog.slice(0, 20).map((product) => product.id))
    expect(result.status).toBe('idle')
    expect(result.error).toBeNull()
  })

  it('never surfaces the cancellation of a superseded request', async () => {
    const { call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))
    const statuses: PaginatorStatus[] = []
    paginator.subscribe((result) => statuses.push(result.status))

    const first = paginator.loadFirstPage()
    const refreshed = paginator.refresh()
    call(0).reject(new CancelledError())
    call(1).resolve(productPage(0))
    await Promise.all([first, refreshed])

    expect(statuses).toEqual(['fetchingFirstPage', 'refreshing', 'idle'])
  })

  it('fails the refresh itself like a first page', async () => {
    const paginator = createPaginator(
      productOptions({ fetchPage: () => Promise.reject(new HttpResponseError(404)) }),
    )

    const result = await paginator.refresh()

    expect(result.status).toBe('error')
    expect(result.error?.kind).toBe('clientFault')
    expect(result.pageCount).toBe(0)
    expect(result.hasNextPage).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Listeners and lifecycle
// ---------------------------------------------------------------------------

describe('Paginator: listeners', () => {
  it('notifies on every transition', async () => {
    const paginator = createPaginator(productOptions())
    const listener = vi.fn()
    paginator.subscribe(listener)

    await paginator.loadFirstPage()

    expect(listener).toHaveBeenCalledTimes(2)
    expect(listener.mock.calls.map(([result]) => result.status)).toEqual([
      'fetchingFirstPage',
      'idle',
    ])
  })

  it('stops notifying after unsubscribe', async () => {
    const paginator = createPaginator(productOptions())
    const listener = vi.fn()
    const unsubscribe = paginator.subscribe(listener)
    unsubscribe()

    await paginator.loadFirstPage()

    expect(listener).not.toHaveBeenCalled()
  })

  it('isolates a throwing listener', async () => {
    const paginator = createPaginator(productOptions())
    const healthy = vi.fn()
    paginator.subscribe(() => {
      throw new Error('listener failure')
    })
    paginator.subscribe(healthy)

    const result = await paginator.loadFirstPage()

    expect(result.items).toHaveLength(20)
    expect(healthy).toHaveBeenCalledTimes(2)
  })

  it('resolves commands when its cache fails to take a notification', async () => {
    const cache: PaginatorCacheInterface = {
      notify: () => {
        throw new Error('cache listener failure')
      },
      remove: vi.fn(),
    }
    const paginator = new Paginator({ options: productOptions({ gcTime: Infinity }), cache })
    const healthy = vi.fn()
    paginator.subscribe(healthy)

    const result = await paginator.loadFirstPage()

    expect(result.status).toBe('idle')
    expect(result.items).toHaveLength(20)
    expect(healthy).toHaveBeenCalledTimes(2)
  })

  it('returns the same projection until the state changes', async () => {
    const paginator = createPaginator(productOptions())
    const before = paginator.getResult()
    expect(paginator.getResult()).toBe(before)

    await paginator.loadFirstPage()

    expect(paginator.getResult()).not.toBe(before)
    expect(paginator.getResult()).toBe(paginator.getResult())
  })
})

describe('Paginator: destroy', () => {
  it('aborts the in-flight request and ignores further commands', async () => {
    const { calls, call, fetchPage } = controlledFetch()
    const paginator = createPaginator(productOptions({ fetchPage }))

    const first = paginator.loadFirstPage()
    paginator.destroy()
    expect(call(0).signal.aborted).toBe(true)
    await first

    await paginator.refresh()
    await paginator.retry()
    expect(calls).toHaveLength(1)
    expect(paginator.getResult().items).toEqual([])
  })

  it('never schedules collection for a standalone paginator', () => {
    vi.useFakeTimers()
    const paginator = new Paginator({ options: productOptions({ gcTime: 10 }) })
    const unsubscribe = paginator.subscribe(() => {})
    unsubscribe()

    expect(paginator.gcTime).toBe(Infinity)
    expect(paginator.isGcScheduled()).toBe(false)
  })
})
