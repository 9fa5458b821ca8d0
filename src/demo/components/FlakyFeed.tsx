import { useState } from 'react'
import { usePaginator } from '@react/usePaginator'
import { formatFieldErrors, offsetPageParser } from '@core/index'
import { api, productSchema, setFailureMode, type FailureMode, type Product } from '../api'

const PAGE_SIZE = 10

const MODES: FailureMode[] = ['none', 'server', 'validation', 'offline', 'hang']

const parseProducts = offsetPageParser({ itemsKey: 'products', itemSchema: productSchema })

export function FlakyFeed() {
  const [mode, setMode] = useState<FailureMode>('none')

  const {
    items,
    status,
    error,
    failedPageKey,
    loadNextPage,
    retry,
    refresh,
  } = usePaginator<Product, unknown, number>({
    paginatorKey: ['products', 'flaky'],
    firstPageKey: 0,
    timeout: 1500,
    fetchPage: (skip: number, { signal }) => api.fetchProducts(skip, PAGE_SIZE, signal, 400),
    parseResponse: parseProducts,
  })

  function changeMode(next: FailureMode) {
    setMode(next)
    setFailureMode(next)
  }

  return (
    <section>
      <h2>2. Classified errors</h2>
      <p style={{ fontSize: '0.85rem', color: '#555' }}>
        Pick a failure, then load more. Items already loaded stay put; Retry re-requests the
        failed page. "hang" trips the 1.5s timeout.
      </p>
      <p>
        {MODES.map((m) => (
          <label key={m} style={{ marginRight: '12px' }}>
            <input type="radio" checked={mode === m} onChange={() => changeMode(m)} /> {m}
          </label>
        ))}
      </p>
      <p>
        Status: <code>{status}</code> · {items.length} items
      </p>
      {error && (
        <div style={{ color: 'red' }}>
          <p>
            <strong>{error.kind}</strong>
            {error.statusCode !== undefined && ` (${error.statusCode})`}: {error.message}
          </p>
          {error.fieldErrors && <pre>{formatFieldErrors(error)}</pre>}
          <p>Failed page key: {String(failedPageKey)}</p>
        </div>
      )}
      <button onClick={() => void loadNextPage()}>Load more</button>{' '}
      <button onClick={() => void retry()} disabled={status !== 'error'}>
        Retry
      </button>{' '}
      <button onClick={() => void refresh()}>Refresh</button>
    </section>
  )
}
