/**
 * pageRequest.ts
 *
 * One attempt at fetching one page.
 *
 * A PageRequest wraps a single call to the caller's fetch function and owns
 * its AbortController. It never retries: a failed page stays failed until the
 * paginator's retry() issues a new request for the same key.
 *
 * The public `promise` is created and the fetch started in the constructor, so
 * the owner can attach handlers immediately. It settles exactly once:
 *
 *   - resolves with the raw response
 *   - rejects with whatever the fetch function rejected or threw
 *   - rejects with TimeoutError when `timeout` elapses first (the signal is aborted)
 *   - rejects with CancelledError when cancel() is called first (the signal is aborted)
 */

import type { FetchPageFunction, PageKey, PaginatorMeta } from './types'
import { CancelledError, TimeoutError } from './errors'
import { isValidTimeout } from './utils'

export interface PageRequestConfig<TResponse, TPageKey extends PageKey = PageKey> {
  pageKey: TPageKey
  fetchPage: FetchPageFunction<TResponse, TPageKey>
  meta?: PaginatorMeta
  /** Milliseconds before the request is aborted and rejected with TimeoutError. */
  timeout?: number
}

export type PageRequestStatus = 'running' | 'cancelled' | 'timedOut' | 'rejected' | 'resolved'

export class PageRequest<TResponse = unknown, TPageKey extends PageKey = PageKey> {
  readonly pageKey: TPageKey
  readonly promise: Promise<TResponse>

  #status: PageRequestStatus = 'running'
  readonly #abortController = new AbortController()
  #timeoutId?: ReturnType<typeof setTimeout>
  #reject?: (reason: unknown) => void

  constructor(config: PageRequestConfig<TResponse, TPageKey>) {
    this.pageKey = config.pageKey

    this.promise = new Promise<TResponse>((resolve, reject) => {
      this.#reject = reject

      if (isValidTimeout(config.timeout)) {
        const timeout = config.timeout
        this.#timeoutId = setTimeout(() => {
          this.#timeoutId = undefined
          if (this.#settle('timedOut')) {
            this.#abortController.abort()
            reject(new TimeoutError(timeout))
          }
        }, timeout)
      }

      let pending: Promise<TResponse>
      try {
        pending = Promise.resolve(
          config.fetchPage(config.pageKey, {
            signal: this.#abortController.signal,
            meta: config.meta,
          }),
        )
      } catch (error) {
        pending = Promise.reject(error)
      }

      pending.then(
        (response) => {
          if (this.#settle('resolved')) resolve(response)
        },
        (error: unknown) => {
          if (this.#settle('rejected')) reject(error)
        },
      )
    })
  }

  status(): PageRequestStatus {
    return this.#status
  }

  /** The signal handed to the fetch function. */
  get signal(): AbortSignal {
    return this.#abortController.signal
  }

  /**
   * Abort the underlying fetch and reject `promise` with CancelledError.
   * A no-op once the request has settled.
   */
  cancel(): void {
    if (!this.#settle('cancelled')) return
    this.#abortController.abort()
    this.#reject?.(new CancelledError())
  }

  /** Move out of 'running'. Returns false when the request had already settled. */
  #settle(status: Exclude<PageRequestStatus, 'running'>): boolean {
    if (this.#status !== 'running') return false
    this.#status = status
    if (this.#timeoutId !== undefined) {
      clearTimeout(this.#timeoutId)
      this.#timeoutId = undefined
    }
    return true
  }
}
