/**
 * index.ts — Barrel export for the core module.
 *
 * Files are listed in dependency order (lowest-level first).
 */

// Shared TypeScript types and interfaces (no runtime code)
export * from './types'

// Pure utility functions
export * from './utils'

// Configuration schemas and logging
export * from './config'
export { createLogger } from './logger'
export type { Logger } from './logger'

// Observer pattern base class, batched notifications, idle collection
export * from './subscribable'
export * from './notifyManager'
export * from './removable'

// Error taxonomy and classifier
export * from './errors'
export * from './errorClassifier'

// Page keys and single-attempt requests
export * from './pageKeyTracker'
export * from './pageRequest'

// The fetch coordinator and its projection
export * from './paginator'

// Ready-made parsers and an HTTP fetcher
export * from './pageParsers'
export * from './httpPageFetcher'

// Bounded registry and client facade
export { PaginatorCache, matchesPaginator } from './paginatorCache'
export type { PaginatorCacheConfig, PaginatorCacheListener } from './paginatorCache'
export { PaginatorClient } from './paginatorClient'
export type { PaginatorClientConfig } from './paginatorClient'
