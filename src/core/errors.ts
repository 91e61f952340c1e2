import type { TJsonValue } from './types.ts'

/** Indicates a configuration problem detected at construction time. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** A required method argument (token, payload or query key) is missing or empty. */
export class InvalidArgumentError extends Error {
  readonly argument: string

  constructor(argument: string, message = `${argument} is required`) {
    super(message)
    this.name = 'InvalidArgumentError'
    this.argument = argument
  }
}

/** Indicates an authentication or authorization failure returned by the API. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AuthError'
  }
}

/** One entry of the `errors` array the API returns on failure. */
export type TApiErrorDetail = {
  message?: string
  code?: string
  fieldName?: string
  relatedResources?: TJsonValue
}

/** Indicates a non-successful HTTP response or an unreadable response body. */
export class APIError extends Error {
  readonly status: number | undefined
  readonly errors: TApiErrorDetail[]

  constructor(message: string, status?: number, errors: TApiErrorDetail[] = []) {
    super(message)
    this.name = 'APIError'
    this.status = status
    this.errors = errors
  }
}

/** Indicates the request did not complete within the configured timeout. */
export class TimeoutError extends Error {
  constructor(message = 'Request timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}
