import { usePaginator } from '@react/usePaginator'
import { cursorPageParser } from '@core/index'
import { api, productSchema, type Product } from '../api'

const PAGE_SIZE = 15

const parseFeed = cursorPageParser({ itemSchema: productSchema })

export function CursorFeed() {
  const {
    items,
    status,
    nextPageKey,
    hasNextPage,
    isExhausted,
    loadNextPage,
  } = usePaginator<Product, unknown, string | null>({
    paginatorKey: ['feed', 'cursor'],
    firstPageKey: null,
    fetchPage: (cursor: string | null, { signal }) =>
      api.fetchProductFeed(cursor, PAGE_SIZE, signal),
    parseResponse: parseFeed,
  })

  return (
    <section>
      <h2>3. Cursor pagination</h2>
      <p>
        Status: <code>{status}</code> · next cursor: <code>{String(nextPageKey ?? '—')}</code>
      </p>
      <p>{items.map((product) => product.id).join(', ')}</p>
      <button onClick={() => void loadNextPage()} disabled={!hasNextPage}>
        Load more
      </button>
      {isExhausted && <p style={{ color: 'green' }}>&#10003; End of feed</p>}
    </section>
  )
}
