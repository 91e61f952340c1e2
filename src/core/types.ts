export type THttpMethod = 'GET' | 'POST' | 'PUT'

export type TJsonPrimitive = string | number | boolean | null

export type TJsonValue = TJsonPrimitive | TJsonValue[] | { [key: string]: TJsonValue }

/** Decoded JSON object as returned by the API. */
export type TJsonObject = { [key: string]: TJsonValue }

export type TQueryValue = string | number | boolean | undefined

export type TQueryParams = Record<string, TQueryValue>

/** Body of a create/update request. */
export type TPayload = Record<string, unknown>

export type THeaders = Record<string, string>

/** Query parameters accepted by the `get*` helpers. `offset` and `maximum` slice the result. */
export type TCollectionParams = TQueryParams & {
  offset?: number
  maximum?: number
}

export type TRetryPolicy = {
  attempts: number
  baseDelayInMilliseconds: number
  maximumDelayInMilliseconds: number
}

/**
 * What the endpoint façade needs from an HTTP client. Each call resolves with the
 * decoded response body or rejects with a transport/API error.
 */
export type THttpTransport = {
  doGet(path: string, params?: TQueryParams): Promise<TJsonObject>
  doPost(path: string, body?: TPayload, headers?: THeaders): Promise<TJsonObject>
  doPut(path: string, body?: TPayload, headers?: THeaders): Promise<TJsonObject>
}

export type TRequestOptions = {
  queryString?: TQueryParams
  body?: unknown
  /** Caller abort; only reachable through `Transport.request`, the client methods take none */
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  headers?: THeaders
}
