import { PaginatorClient } from '@core/index'
import { PaginatorClientProvider } from '@react/PaginatorClientProvider'
import { ProductFeed } from './components/ProductFeed'
import { FlakyFeed } from './components/FlakyFeed'
import { CursorFeed } from './components/CursorFeed'

const paginatorClient = new PaginatorClient({
  defaultOptions: {
    gcTime: 5 * 60 * 1000, // 5 min
  },
  cache: { maxSize: 20 },
})

export function App() {
  return (
    <PaginatorClientProvider client={paginatorClient}>
      <div style={{ maxWidth: '800px', margin: '0 auto', padding: '20px', fontFamily: 'system-ui, sans-serif' }}>
        <h1 style={{ borderBottom: '2px solid #0ea5e9', paddingBottom: '8px' }}>pagewise</h1>
        <p style={{ color: '#555', marginBottom: '24px' }}>
          Page-at-a-time loading with coalesced requests, stale-response protection and a closed
          error taxonomy.
        </p>

        <div style={{ display: 'grid', gap: '24px' }}>
          <ProductFeed />
          <FlakyFeed />
          <CursorFeed />
        </div>
      </div>
    </PaginatorClientProvider>
  )
}
