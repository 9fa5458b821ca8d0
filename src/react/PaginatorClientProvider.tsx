import { createContext, useContext, type ReactNode } from 'react'
import type { PaginatorClient } from '@core/index'

const PaginatorClientContext = createContext<PaginatorClient | null>(null)

export function PaginatorClientProvider({
  client,
  children,
}: {
  client: PaginatorClient
  children: ReactNode
}) {
  return (
    <PaginatorClientContext.Provider value={client}>
      {children}
    </PaginatorClientContext.Provider>
  )
}

export function usePaginatorClient(): PaginatorClient {
  const client = useContext(PaginatorClientContext)
  if (!client) {
    throw new Error('usePaginatorClient must be used within a PaginatorClientProvider')
  }
  return client
}
