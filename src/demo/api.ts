// Simulated backends for the demo feeds. Nothing here touches the network.
import { z } from 'zod'
import { CancelledError, HttpResponseError, NoConnectivityError } from '@core/index'

export const productSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  price: z.number(),
  category: z.string(),
})

export type Product = z.infer<typeof productSchema>

const CATEGORIES = ['phones', 'laptops', 'audio', 'cameras', 'watches']

export const TOTAL_PRODUCTS = 45

const products: Product[] = Array.from({ length: TOTAL_PRODUCTS }, (_, index) => ({
  id: index + 1,
  title: `Product ${index + 1}`,
  price: 10 + ((index * 37) % 90),
  category: CATEGORIES[index % CATEGORIES.length] ?? 'misc',
}))

/** Resolves after `ms`, or rejects with CancelledError when `signal` aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }
    const id = setTimeout(resolve, ms)
    signal?.addEventListener('abort', () => {
      clearTimeout(id)
      reject(new CancelledError())
    })
  })
}

// Failure toggle used by FlakyFeed
export type FailureMode = 'none' | 'server' | 'validation' | 'offline' | 'hang'

let failureMode: FailureMode = 'none'

export function setFailureMode(mode: FailureMode): void {
  failureMode = mode
}

function failIfRequested(): void {
  switch (failureMode) {
    case 'server':
      throw new HttpResponseError(503, { statusText: 'Service Unavailable' })
    case 'validation':
      throw new HttpResponseError(422, {
        body: {
          message: 'The given data was invalid.',
          errors: { limit: ['The limit may not be greater than 20.'] },
        },
      })
    case 'offline':
      throw new NoConnectivityError()
    case 'hang':
    case 'none':
      return
  }
}

export const api = {
  /** DummyJSON-style offset page: `limit` echoes the size of the page returned. */
  async fetchProducts(skip: number, limit: number, signal?: AbortSignal, latency = 600) {
    await delay(failureMode === 'hang' ? 60_000 : latency, signal)
    failIfRequested()
    const page = products.slice(skip, skip + limit)
    return { products: page, total: TOTAL_PRODUCTS, skip, limit: page.length }
  },

  /** Cursor page: the cursor is the id of the last product already sent. */
  async fetchProductFeed(cursor: string | null, limit: number, signal?: AbortSignal, latency = 500) {
    await delay(latency, signal)
    const start = cursor === null ? 0 : products.findIndex((p) => String(p.id) === cursor) + 1
    const page = products.slice(start, start + limit)
    const last = page[page.length - 1]
    const hasMore = start + limit < products.length
    return {
      data: page,
      pagination: { next_cursor: hasMore && last ? String(last.id) : null, has_more: hasMore },
    }
  },
}
