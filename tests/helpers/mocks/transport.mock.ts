import { vi, type Mock } from 'vitest'
import type { THttpTransport, TJsonObject } from '../../../src/core/types.ts'

export type TMockTransport = {
  doGet: Mock<THttpTransport['doGet']>
  doPost: Mock<THttpTransport['doPost']>
  doPut: Mock<THttpTransport['doPut']>
}

/** Transport stand-in: every method resolves with `{}` unless told otherwise. */
export function createMockTransport(): TMockTransport {
  return {
    doGet: vi.fn<THttpTransport['doGet']>().mockResolvedValue({}),
    doPost: vi.fn<THttpTransport['doPost']>().mockResolvedValue({}),
    doPut: vi.fn<THttpTransport['doPut']>().mockResolvedValue({}),
  }
}

/**
 * Serves `items` from `doGet` the way a listing endpoint does: the `offset` and
 * `limit` query parameters pick the page and an exhausted listing has no `data`.
 */
export function servePages(transport: TMockTransport, items: TJsonObject[]): void {
  transport.doGet.mockImplementation(async (_path, params): Promise<TJsonObject> => {
    const offset = Number(params?.offset ?? 0)
    const limit = Number(params?.limit ?? 10)
    const page = items.slice(offset, offset + limit)
    return page.length > 0 ? { count: items.length, offset, limit, data: page } : {}
  })
}
