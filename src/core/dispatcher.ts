import { APIError, InvalidArgumentError } from './errors.ts'
import type { Resource, TResourceConstructor } from './resource.ts'
import type {
  THeaders,
  THttpMethod,
  THttpTransport,
  TJsonObject,
  TPayload,
  TQueryParams,
} from './types.ts'
import { isEmptyPayload, isJsonObject, withProgramToken } from './utils.ts'

const PATH_TOKEN_PATTERN = /\{(\w+)\}/g

/** Names of the `{placeholders}` in a path template, e.g. `'userToken'` for `users/{userToken}`. */
export type TPathTokenNames<P extends string> = P extends `${string}{${infer Name}}${infer Rest}`
  ? Name | TPathTokenNames<Rest>
  : never

export type TPathTokens<P extends string> = Record<TPathTokenNames<P>, string | undefined>

export type TResponseWrapper<TResult> = (body: TJsonObject) => TResult

export type TRequiredHeader = {
  header: string
  /** Argument name reported when the header value is missing */
  argument: string
}

export type TEndpoint<P extends string, TResult> = {
  method: THttpMethod
  /** Path relative to the API root; `{name}` placeholders are filled from the call's tokens */
  path: P
  /** The call must carry a non-empty payload */
  requiresData?: boolean
  /** Query keys that must be present and non-empty */
  requiredParams?: readonly string[]
  requiredHeaders?: readonly TRequiredHeader[]
  /** Add the client's program token to the payload when the caller left it out */
  injectProgramToken?: boolean
  wrap: TResponseWrapper<TResult>
}

export type TDispatchArgs<P extends string> = {
  tokens?: TPathTokens<P>
  data?: TPayload
  params?: TQueryParams
  headers?: THeaders
}

export function defineEndpoint<P extends string, TResult>(
  endpoint: TEndpoint<P, TResult>,
): TEndpoint<P, TResult> {
  return endpoint
}

/** Wraps the whole response body in a resource. */
export function asResource<R extends Resource>(
  resource: TResourceConstructor<R>,
): TResponseWrapper<R> {
  return (body) => new resource(body)
}

/** Wraps each element of the response's `data` array; a missing `data` is an empty list. */
export function asList<R extends Resource>(
  resource: TResourceConstructor<R>,
): TResponseWrapper<R[]> {
  return (body) => {
    const data = body.data
    if (data === undefined || data === null) return []
    if (!Array.isArray(data)) throw new APIError('Expected `data` to be a list')
    return data.map((item) => {
      if (!isJsonObject(item)) throw new APIError('Expected every `data` item to be an object')
      return new resource(item)
    })
  }
}

/** Returns the decoded body as is. */
export const asRaw: TResponseWrapper<TJsonObject> = (body) => body

function lookupToken(
  tokens: Readonly<Record<string, string | undefined>> | undefined,
  name: string,
): string | undefined {
  return tokens?.[name]
}

export type TRequestDispatcherOptions = {
  transport: THttpTransport
  programToken: string
}

/**
 * Runs an endpoint definition: checks the required arguments, fills the path,
 * sends the request through the transport and wraps the response.
 * Nothing is sent when a check fails; transport errors propagate unchanged.
 */
export class RequestDispatcher {
  private transport: THttpTransport
  private programToken: string

  constructor(options: TRequestDispatcherOptions) {
    this.transport = options.transport
    this.programToken = options.programToken
  }

  public async dispatch<P extends string, TResult>(
    endpoint: TEndpoint<P, TResult>,
    args: TDispatchArgs<P> = {},
  ): Promise<TResult> {
    const path: string = this.buildPath(endpoint.path, args.tokens)

    for (const { header, argument } of endpoint.requiredHeaders ?? []) {
      if (!args.headers?.[header]) throw new InvalidArgumentError(argument)
    }

    let body: TPayload | undefined = args.data
    if (endpoint.requiresData && isEmptyPayload(body)) throw new InvalidArgumentError('data')
    if (body && endpoint.injectProgramToken) body = withProgramToken(body, this.programToken)

    for (const key of endpoint.requiredParams ?? []) {
      const value = args.params?.[key]
      if (value === undefined || value === '') throw new InvalidArgumentError(key)
    }

    const response: TJsonObject = await this.send(
      endpoint.method,
      path,
      body,
      args.params,
      args.headers,
    )
    return endpoint.wrap(response)
  }

  private buildPath(
    template: string,
    tokens: Readonly<Record<string, string | undefined>> | undefined,
  ): string {
    for (const [, name] of template.matchAll(PATH_TOKEN_PATTERN)) {
      if (!lookupToken(tokens, name)) throw new InvalidArgumentError(name)
    }
    return template.replace(
      PATH_TOKEN_PATTERN,
      (_match, name: string) => lookupToken(tokens, name) ?? '',
    )
  }

  private async send(
    method: THttpMethod,
    path: string,
    body: TPayload | undefined,
    params: TQueryParams | undefined,
    headers: THeaders | undefined,
  ): Promise<TJsonObject> {
    switch (method) {
      case 'GET':
        return await this.transport.doGet(path, params)
      case 'POST':
        return await this.transport.doPost(path, body, headers)
      case 'PUT':
        return await this.transport.doPut(path, body, headers)
    }
  }
}
