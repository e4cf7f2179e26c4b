import { z } from 'zod'

export { ReadWriteLock, type Release } from './lock.js'

export const CATALOG_CONSTANTS = {
  DEFAULT_LIST_LIMIT: 50,
  MAX_LIST_LIMIT: 100,
  SYSTEM_SCOPE: 'system',
}

export const deepClone = <T>(x: T): T => {
  if (typeof structuredClone === 'function') return structuredClone(x)
  // plain JSON-shaped data only
  return JSON.parse(JSON.stringify(x))
}

export const ListOptionsSchema = z.object({
  cursor: z.string().optional(),
  limit: z.number().int().positive().optional(),
})
export type ListOptions = z.infer<typeof ListOptionsSchema>

export type ListResult<T> = {
  items: T[]
  nextCursor?: string
}

/**
 * Cursor pagination over an already sorted list. The cursor is the key of the last item of the
 * previous page; an unknown cursor restarts from the beginning.
 */
export function paginate<T>(
  sorted: readonly T[],
  keyOf: (item: T) => string,
  options?: ListOptions,
): ListResult<T> {
  const parsed = ListOptionsSchema.parse(options ?? {})
  const limit = Math.max(
    1,
    Math.min(parsed.limit ?? CATALOG_CONSTANTS.DEFAULT_LIST_LIMIT, CATALOG_CONSTANTS.MAX_LIST_LIMIT),
  )

  let start = 0
  if (parsed.cursor) {
    const idx = sorted.findIndex((item) => keyOf(item) === parsed.cursor)
    start = idx >= 0 ? idx + 1 : 0
  }

  const slice = sorted.slice(start, start + limit)
  const last = slice[slice.length - 1]
  const nextCursor = start + limit < sorted.length && last !== undefined ? keyOf(last) : undefined

  return { items: slice, nextCursor }
}
