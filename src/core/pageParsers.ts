/**
 * pageParsers.ts
 *
 * Ready-made response parsers for the three common pagination envelopes.
 * Each validates the raw response with zod and throws a ZodError when it is
 * malformed; the paginator classifies that as an `unclassified` failure.
 *
 * The item schema is required; pass `z.unknown()` to accept items unchecked.
 */

import { z } from 'zod'
import type { ParseResponseFunction } from './types'

/** Any zod schema whose parsed output is TItem, whatever its input type. */
export type ItemSchema<TItem> = z.ZodType<TItem, z.ZodTypeDef, unknown>

const jsonObjectSchema = z.record(z.string(), z.unknown())

const countSchema = z.number().int().nonnegative()

// ---------------------------------------------------------------------------
// Offset (skip / limit / total)
// ---------------------------------------------------------------------------

export interface OffsetPageParserOptions<TItem> {
  /** Property holding the items, e.g. 'products'. */
  itemsKey: string
  itemSchema: ItemSchema<TItem>
}

const offsetEnvelopeSchema = z.object({
  total: countSchema,
  skip: countSchema,
  limit: countSchema,
})

/**
 * `{ [itemsKey]: [...], total, skip, limit }`
 *
 * The next key is `skip + limit`; the page is the last one once that reaches
 * `total`. `limit` is the size of the page the server actually returned.
 */
export function offsetPageParser<TItem>({
  itemsKey,
  itemSchema,
}: OffsetPageParserOptions<TItem>): ParseResponseFunction<TItem, unknown, number> {
  const itemsSchema = z.array(itemSchema)

  return (response) => {
    const json = jsonObjectSchema.parse(response)
    const { total, skip, limit } = offsetEnvelopeSchema.parse(json)
    const items = itemsSchema.parse(json[itemsKey])
    // A server echoing limit 0 would otherwise request the same offset forever.
    const nextKey = skip + (limit || items.length)

    return {
      items,
      nextKey,
      isLastPage: nextKey >= total,
      totalItems: total,
    }
  }
}

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

export interface CursorPageParserOptions<TItem> {
  itemSchema: ItemSchema<TItem>
  itemsKey?: string
  paginationKey?: string
  nextCursorKey?: string
  hasMoreKey?: string
}

/**
 * `{ data: [...], pagination: { next_cursor, has_more } }`
 *
 * A missing `has_more` counts as false. The cursor is only followed while
 * `has_more` is true.
 */
export function cursorPageParser<TItem>({
  itemSchema,
  itemsKey = 'data',
  paginationKey = 'pagination',
  nextCursorKey = 'next_cursor',
  hasMoreKey = 'has_more',
}: CursorPageParserOptions<TItem>): ParseResponseFunction<TItem, unknown, string | null> {
  const itemsSchema = z.array(itemSchema)

  return (response) => {
    const json = jsonObjectSchema.parse(response)
    const items = itemsSchema.parse(json[itemsKey])
    const pagination = jsonObjectSchema.optional().parse(json[paginationKey])
    const hasMore = z.boolean().optional().parse(pagination?.[hasMoreKey]) === true
    const nextCursor = z.string().nullish().parse(pagination?.[nextCursorKey])

    return {
      items,
      nextKey: hasMore ? (nextCursor ?? null) : null,
      isLastPage: !hasMore,
    }
  }
}

// ---------------------------------------------------------------------------
// Page number
// ---------------------------------------------------------------------------

export interface PageNumberPageParserOptions<TItem> {
  itemSchema: ItemSchema<TItem>
  itemsKey?: string
  currentPageKey?: string
  lastPageKey?: string
  totalKey?: string
}

const pageNumberSchema = z.number().int()

/**
 * `{ data: [...], current_page, last_page, total }`
 *
 * The next key is `current_page + 1` until `current_page` reaches `last_page`.
 */
export function pageNumberPageParser<TItem>({
  itemSchema,
  itemsKey = 'data',
  currentPageKey = 'current_page',
  lastPageKey = 'last_page',
  totalKey = 'total',
}: PageNumberPageParserOptions<TItem>): ParseResponseFunction<TItem, unknown, number> {
  const itemsSchema = z.array(itemSchema)

  return (response) => {
    const json = jsonObjectSchema.parse(response)
    const items = itemsSchema.parse(json[itemsKey])
    const currentPage = pageNumberSchema.parse(json[currentPageKey])
    const lastPage = pageNumberSchema.parse(json[lastPageKey])
    const total = countSchema.optional().parse(json[totalKey])
    const isLastPage = currentPage >= lastPage

    return {
      items,
      nextKey: isLastPage ? null : currentPage + 1,
      isLastPage,
      totalItems: total,
    }
  }
}
