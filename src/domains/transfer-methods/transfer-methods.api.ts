import { asRaw, defineEndpoint, RequestDispatcher } from '../../core/dispatcher.ts'
import type { TJsonObject, TPayload, TQueryParams } from '../../core/types.ts'

export const CACHE_TOKEN_HEADER = 'Json-Cache-Token'

const TRANSFER_METHOD_ENDPOINTS = {
  listConfigurations: defineEndpoint({
    method: 'GET',
    path: 'transfer-method-configurations',
    requiredParams: ['userToken'],
    wrap: asRaw,
  }),
  retrieveConfiguration: defineEndpoint({
    method: 'GET',
    path: 'transfer-method-configurations',
    requiredParams: ['userToken', 'country', 'currency', 'type', 'profileType'],
    wrap: asRaw,
  }),
  create: defineEndpoint({
    method: 'POST',
    path: 'users/{userToken}/transfer-methods',
    requiredHeaders: [{ header: CACHE_TOKEN_HEADER, argument: 'cacheToken' }],
    wrap: asRaw,
  }),
}

export type TTransferMethodsApiOptions = {
  dispatcher: RequestDispatcher
}

/** Transfer-method configurations and transfer methods created from a cached form. */
export class TransferMethodsApi {
  private dispatcher: RequestDispatcher

  constructor(options: TTransferMethodsApiOptions) {
    this.dispatcher = options.dispatcher
  }

  /** Lists the configurations available to `params.userToken`. */
  public async listTransferMethodConfigurations(params: TQueryParams = {}): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(TRANSFER_METHOD_ENDPOINTS.listConfigurations, {
      params,
    })
  }

  /**
   * Reads the configuration for one user, country, currency, transfer method type
   * and profile type, all given as query parameters.
   */
  public async retrieveTransferMethodConfiguration(
    params: TQueryParams = {},
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(TRANSFER_METHOD_ENDPOINTS.retrieveConfiguration, {
      params,
    })
  }

  /** The cache token travels as a header; `data` may be omitted. */
  public async createTransferMethod(
    userToken?: string,
    cacheToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(TRANSFER_METHOD_ENDPOINTS.create, {
      tokens: { userToken },
      headers: cacheToken ? { [CACHE_TOKEN_HEADER]: cacheToken } : undefined,
      data,
    })
  }
}
