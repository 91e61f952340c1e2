import { ConfigurationError, InvalidArgumentError, type TApiErrorDetail } from './errors.ts'
import type { TJsonObject, TPayload } from './types.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved: typeof fetch | undefined = override ?? globalThis.fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export function isJsonObject(value: unknown): value is TJsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Reads the `errors` array of a failed response. Returns an empty list for any other body. */
export async function extractResponseErrors(response: Response): Promise<TApiErrorDetail[]> {
  let body: unknown
  try {
    body = await response.json()
  } catch {
    return []
  }
  if (!isJsonObject(body) || !Array.isArray(body.errors)) return []

  const details: TApiErrorDetail[] = []
  for (const entry of body.errors) {
    if (!isJsonObject(entry)) continue
    details.push({
      message: typeof entry.message === 'string' ? entry.message : undefined,
      code: typeof entry.code === 'string' ? entry.code : undefined,
      fieldName: typeof entry.fieldName === 'string' ? entry.fieldName : undefined,
      relatedResources: entry.relatedResources,
    })
  }
  return details
}

/**
 * Timeout signal that also follows an optional outer signal. `hasTimedOut` tells a
 * timeout apart from a caller abort.
 */
export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; cleanup: () => void; hasTimedOut: () => boolean } {
  const controller = new AbortController()
  let timedOut = false
  const timeoutId = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, cleanup: () => clearTimeout(timeoutId), hasTimedOut: () => timedOut }
}

export function validateRequiredStrings<T extends Record<string, unknown>>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    const value = options[key]
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigurationError(`${key} is required`)
    }
  }
}

export function assertRequired(
  argument: string,
  value: string | undefined | null,
): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidArgumentError(argument)
  }
}

export function isEmptyPayload(data: TPayload | undefined | null): boolean {
  return !data || Object.keys(data).length === 0
}

/**
 * Returns the payload with `programToken` set, unless the key is already present.
 * The caller's object is never modified.
 */
export function withProgramToken(data: TPayload, programToken: string): TPayload {
  if ('programToken' in data) return data
  return { ...data, programToken }
}
