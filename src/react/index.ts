/**
 * React adapter barrel exports.
 *
 * Provides the thin React integration layer on top of the
 * framework-agnostic core.
 */
export { PaginatorClientProvider, usePaginatorClient } from './PaginatorClientProvider'
export { usePaginator } from './usePaginator'
export type { UsePaginatorOptions, UsePaginatorResult } from './usePaginator'
