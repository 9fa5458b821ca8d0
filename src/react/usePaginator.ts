import { useCallback, useEffect, useMemo, useState, useSyncExternalStore } from 'react'
import { hashPaginatorKey, notifyManager } from '@core/index'
import type { CachedPaginatorOptions, PageKey, PaginatorResult } from '@core/index'
import { usePaginatorClient } from './PaginatorClientProvider'

export interface UsePaginatorOptions<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>
  extends CachedPaginatorOptions<TItem, TResponse, TPageKey> {
  /** Set to false to skip loading the first page on mount. */
  enabled?: boolean
}

export interface UsePaginatorResult<TItem, TPageKey extends PageKey = PageKey>
  extends PaginatorResult<TItem, TPageKey> {
  loadFirstPage: () => Promise<PaginatorResult<TItem, TPageKey>>
  loadNextPage: () => Promise<PaginatorResult<TItem, TPageKey>>
  refresh: () => Promise<PaginatorResult<TItem, TPageKey>>
  retry: () => Promise<PaginatorResult<TItem, TPageKey>>
}

export function usePaginator<TItem, TResponse = unknown, TPageKey extends PageKey = PageKey>(
  options: UsePaginatorOptions<TItem, TResponse, TPageKey>,
): UsePaginatorResult<TItem, TPageKey> {
  const client = usePaginatorClient()
  const paginatorHash = hashPaginatorKey(options.paginatorKey)

  // Bumped when the cache drops our paginator so the next render builds a new one.
  const [generation, setGeneration] = useState(0)

  // One paginator per key; a key change switches to (or creates) another one.
  const paginator = useMemo(
    () => client.getPaginator(options),
    // eslint-disable-next-line react-hooks/exhaustive-deps
    [client, paginatorHash, generation],
  )

  useEffect(() => {
    const cache = client.getPaginatorCache()
    const replace = () => setGeneration((current) => current + 1)

    // Removed between render and this effect.
    if (!cache.getAll().some((entry) => entry === paginator)) {
      replace()
      return undefined
    }

    return cache.subscribe((event) => {
      if (event.type === 'removed' && event.paginator === paginator) replace()
    })
  }, [client, paginator])

  // Keep fetchPage / parseResponse closures current without rebuilding.
  useEffect(() => {
    paginator.setOptions(client.defaultPaginatorOptions(options))
  })

  const subscribe = useCallback(
    (onStoreChange: () => void) => paginator.subscribe(notifyManager.batchCalls(onStoreChange)),
    [paginator],
  )
  const getSnapshot = useCallback(() => paginator.getResult(), [paginator])
  const result = useSyncExternalStore(subscribe, getSnapshot, getSnapshot)

  const enabled = options.enabled !== false
  useEffect(() => {
    if (enabled) {
      void paginator.loadFirstPage()
    }
  }, [paginator, enabled])

  const commands = useMemo(
    () => ({
      loadFirstPage: () => paginator.loadFirstPage(),
      loadNextPage: () => paginator.loadNextPage(),
      refresh: () => paginator.refresh(),
      retry: () => paginator.retry(),
    }),
    [paginator],
  )

  return useMemo(() => ({ ...result, ...commands }), [result, commands])
}
