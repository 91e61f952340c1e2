import { API_BASE_PATH } from './config.ts'
import { AbortOperationError, APIError, AuthError, TimeoutError } from './errors.ts'
import { logger } from './logger.ts'
import { calculateBackoff, DEFAULT_RETRY_POLICY, sleep } from './retry.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  THeaders,
  THttpMethod,
  THttpTransport,
  TJsonObject,
  TPayload,
  TQueryParams,
  TRequestOptions,
  TRetryPolicy,
} from './types.ts'
import {
  extractResponseErrors,
  createTimeoutSignal,
  isJsonObject,
  normalizeBaseUrl,
  resolveFetch,
} from './utils.ts'

const DEFAULT_TIMEOUT_IN_MILLISECONDS = 30_000

/** Methods that may be sent again after a failure; POST never is. */
const RETRYABLE_METHODS: ReadonlySet<THttpMethod> = new Set(['GET', 'PUT'])

export type TTransportOptions = {
  server: string
  username: string
  password: string
  retryPolicy?: TRetryPolicy
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch | undefined
}

/**
 * Authenticated JSON client for the REST API, built on `fetch`.
 * Network failures and 5xx responses of GET and PUT are retried with back-off;
 * POST and every other failure surface as an error on the first response.
 */
export class Transport implements THttpTransport {
  private baseUrl: string
  private authorization: string
  private retryPolicy: TRetryPolicy
  private timeoutInMilliseconds: number
  private userAgent: string = USER_AGENT
  private fetchImplementation: typeof fetch

  constructor(options: TTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.server) + API_BASE_PATH
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  public async doGet(path: string, params?: TQueryParams): Promise<TJsonObject> {
    return await this.request('GET', path, { queryString: params })
  }

  public async doPost(path: string, body?: TPayload, headers?: THeaders): Promise<TJsonObject> {
    return await this.request('POST', path, { body, headers })
  }

  public async doPut(path: string, body?: TPayload, headers?: THeaders): Promise<TJsonObject> {
    return await this.request('PUT', path, { body, headers })
  }

  async request(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TJsonObject> {
    const urlObject: URL = new URL(`${this.baseUrl}/${path}`)
    if (requestOptions.queryString) {
      for (const [queryKey, queryValue] of Object.entries(requestOptions.queryString)) {
        if (queryValue !== undefined) urlObject.searchParams.set(queryKey, String(queryValue))
      }
    }

    const timeoutInMilliseconds: number =
      requestOptions.timeoutInMilliseconds ?? this.timeoutInMilliseconds
    const attempts: number = RETRYABLE_METHODS.has(httpMethod)
      ? Math.max(1, this.retryPolicy.attempts)
      : 1
    const hasBody: boolean = requestOptions.body !== undefined

    for (let attemptIndex = 0; ; attemptIndex++) {
      const isLastAttempt: boolean = attemptIndex >= attempts - 1
      if (requestOptions.signal?.aborted) throw new AbortOperationError()

      const timeout = createTimeoutSignal(timeoutInMilliseconds, requestOptions.signal)
      let httpResponse: Response
      try {
        httpResponse = await this.fetchImplementation(urlObject, {
          method: httpMethod,
          headers: {
            authorization: this.authorization,
            accept: 'application/json',
            'user-agent': this.userAgent,
            ...(hasBody ? { 'content-type': 'application/json' } : {}),
            ...(requestOptions.headers ?? {}),
          },
          body: hasBody ? JSON.stringify(requestOptions.body) : undefined,
          signal: timeout.signal,
        })
      } catch (caughtError) {
        timeout.cleanup()
        if (requestOptions.signal?.aborted) throw new AbortOperationError()
        const failure: unknown = timeout.hasTimedOut()
          ? new TimeoutError(
              `Request timed out after ${timeoutInMilliseconds}ms: ${httpMethod} ${path}`,
            )
          : caughtError
        if (isLastAttempt) throw failure
        await this.waitBeforeRetry(
          attemptIndex,
          `${httpMethod} ${path} failed`,
          failure,
          requestOptions.signal,
        )
        continue
      }

      if (httpResponse.status >= 500 && httpResponse.status <= 599 && !isLastAttempt) {
        timeout.cleanup()
        await this.waitBeforeRetry(
          attemptIndex,
          `${httpMethod} ${path} returned HTTP ${httpResponse.status}`,
          undefined,
          requestOptions.signal,
        )
        continue
      }

      try {
        return await this.readResponse(httpResponse, httpMethod, path)
      } catch (caughtError) {
        // the timeout stays armed while the body is read
        if (requestOptions.signal?.aborted) throw new AbortOperationError()
        if (timeout.hasTimedOut()) {
          throw new TimeoutError(
            `Request timed out after ${timeoutInMilliseconds}ms: ${httpMethod} ${path}`,
          )
        }
        throw caughtError
      } finally {
        timeout.cleanup()
      }
    }
  }

  private async waitBeforeRetry(
    attemptIndex: number,
    reason: string,
    cause: unknown,
    signal?: AbortSignal,
  ): Promise<void> {
    const delay: number = calculateBackoff(attemptIndex, this.retryPolicy)
    const message = `${reason}, retrying in ${Math.round(delay)}ms`
    if (cause === undefined) logger.warn(message)
    else logger.warn(message, cause)
    await sleep(delay, signal)
  }

  private async readResponse(
    httpResponse: Response,
    httpMethod: THttpMethod,
    path: string,
  ): Promise<TJsonObject> {
    if (httpResponse.status === 401 || httpResponse.status === 403) {
      throw new AuthError(`Authentication failed with status ${httpResponse.status}`)
    }

    if (!httpResponse.ok) {
      const errors = await extractResponseErrors(httpResponse)
      const detail: string = errors[0]?.message ? `: ${errors[0].message}` : ''
      throw new APIError(
        `HTTP ${httpResponse.status} for ${httpMethod} ${path}${detail}`,
        httpResponse.status,
        errors,
      )
    }

    if (httpResponse.status === 204) return {}

    const text: string = await httpResponse.text()
    if (text.trim().length === 0) return {}

    let parsedJson: unknown
    try {
      parsedJson = JSON.parse(text)
    } catch {
      throw new APIError(`Invalid JSON in response to ${httpMethod} ${path}`, httpResponse.status)
    }
    if (!isJsonObject(parsedJson)) {
      throw new APIError(`Unexpected response body for ${httpMethod} ${path}`, httpResponse.status)
    }
    return parsedJson
  }
}
