import { InvalidArgumentError } from './errors.ts'
import type { TCollectionParams, TQueryParams } from './types.ts'

/** Page size used for every request a collection issues. */
export const COLLECTION_CHUNK_SIZE = 100

const RESERVED_PARAMS: ReadonlySet<string> = new Set(['offset', 'limit', 'maximum'])

export type TFetchPage<T> = (offset: number, limit: number) => Promise<T[]>

export type TCollectionSlice = {
  /** Index of the first item, defaults to 0 */
  offset?: number
  /** Upper bound on the number of items returned; unbounded when absent */
  maximum?: number
}

function resolveOffset(offset: number | undefined): number {
  if (offset === undefined) return 0
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidArgumentError('offset', 'offset must be a non-negative integer')
  }
  return offset
}

/**
 * Reads pages of COLLECTION_CHUNK_SIZE items until a short page is returned or
 * `maximum` items have been collected, then truncates to `maximum`.
 * A `maximum` below 1 returns an empty list without fetching.
 */
export async function getCollection<T>(
  fetchPage: TFetchPage<T>,
  slice: TCollectionSlice = {},
): Promise<T[]> {
  const { maximum } = slice
  if (maximum !== undefined && Number.isNaN(maximum)) {
    throw new InvalidArgumentError('maximum', 'maximum must be a number')
  }
  let offset: number = resolveOffset(slice.offset)
  if (maximum !== undefined && maximum < 1) return []

  const results: T[] = []
  for (;;) {
    const page: T[] = await fetchPage(offset, COLLECTION_CHUNK_SIZE)
    results.push(...page)
    offset += COLLECTION_CHUNK_SIZE

    if (page.length < COLLECTION_CHUNK_SIZE) break
    if (maximum !== undefined && results.length >= maximum) break
  }

  return maximum === undefined ? results : results.slice(0, maximum)
}

/**
 * Applies getCollection to a listing operation. `offset` and `maximum` slice the
 * result, `limit` is dropped, and every other parameter is sent with each page.
 */
export async function collect<T>(
  list: (params: TQueryParams) => Promise<T[]>,
  params: TCollectionParams = {},
): Promise<T[]> {
  const filters: TQueryParams = {}
  for (const [key, value] of Object.entries(params)) {
    if (!RESERVED_PARAMS.has(key)) filters[key] = value
  }

  return await getCollection(
    (offset, limit) => list({ ...filters, offset, limit }),
    { offset: params.offset, maximum: params.maximum },
  )
}
