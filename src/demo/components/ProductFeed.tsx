import { usePaginator } from '@react/usePaginator'
import { offsetPageParser } from '@core/index'
import { api, productSchema, type Product } from '../api'

const PAGE_SIZE = 20

const parseProducts = offsetPageParser({ itemsKey: 'products', itemSchema: productSchema })

export function ProductFeed() {
  const {
    items,
    status,
    isLoadingFirstPage,
    isLoadingNextPage,
    isRefreshing,
    hasNextPage,
    isExhausted,
    totalItems,
    loadNextPage,
    refresh,
  } = usePaginator<Product, unknown, number>({
    paginatorKey: ['products', { limit: PAGE_SIZE }],
    firstPageKey: 0,
    fetchPage: (skip: number, { signal }) => api.fetchProducts(skip, PAGE_SIZE, signal),
    parseResponse: parseProducts,
  })

  return (
    <section>
      <h2>1. Offset pagination</h2>
      <p style={{ fontSize: '0.85rem', color: '#555' }}>
        45 products, 20 per page. The third page holds 5 and ends the list.
      </p>
      <p>
        Status: <code>{status}</code> · {items.length} / {totalItems ?? '?'} loaded
      </p>
      {(isLoadingFirstPage || isRefreshing) && <p>Loading first page…</p>}
      <ul style={{ maxHeight: '200px', overflow: 'auto' }}>
        {items.map((product) => (
          <li key={product.id}>
            {product.title} — {product.category} — ${product.price}
          </li>
        ))}
      </ul>
      <button onClick={() => void loadNextPage()} disabled={!hasNextPage}>
        {isLoadingNextPage ? 'Loading…' : 'Load more'}
      </button>{' '}
      <button onClick={() => void refresh()}>Refresh</button>
      {isExhausted && <p style={{ color: 'green' }}>&#10003; No more products</p>}
    </section>
  )
}
