import { collect } from '../../core/collection.ts'
import {
  asList,
  asRaw,
  asResource,
  defineEndpoint,
  RequestDispatcher,
} from '../../core/dispatcher.ts'
import { User } from '../../core/resource.ts'
import type { TCollectionParams, TJsonObject, TPayload, TQueryParams } from '../../core/types.ts'

const USER_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: 'users', wrap: asList(User) }),
  create: defineEndpoint({
    method: 'POST',
    path: 'users',
    requiresData: true,
    injectProgramToken: true,
    wrap: asResource(User),
  }),
  retrieve: defineEndpoint({ method: 'GET', path: 'users/{userToken}', wrap: asResource(User) }),
  update: defineEndpoint({
    method: 'PUT',
    path: 'users/{userToken}',
    requiresData: true,
    wrap: asResource(User),
  }),
  listBalances: defineEndpoint({ method: 'GET', path: 'users/{userToken}/balances', wrap: asRaw }),
  listReceipts: defineEndpoint({ method: 'GET', path: 'users/{userToken}/receipts', wrap: asRaw }),
}

export type TUsersApiOptions = {
  dispatcher: RequestDispatcher
}

/** Users endpoints. `createUser` fills in the client's program token. */
export class UsersApi {
  private dispatcher: RequestDispatcher

  constructor(options: TUsersApiOptions) {
    this.dispatcher = options.dispatcher
  }

  /** Pages through `listUsers` and returns users between `offset` and `maximum`. */
  public async getUsers(params?: TCollectionParams): Promise<User[]> {
    return await collect((pageParams) => this.listUsers(pageParams), params)
  }

  public async listUsers(params?: TQueryParams): Promise<User[]> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.list, { params })
  }

  public async createUser(data?: TPayload): Promise<User> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.create, { data })
  }

  public async retrieveUser(userToken?: string): Promise<User> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.retrieve, { tokens: { userToken } })
  }

  public async updateUser(userToken?: string, data?: TPayload): Promise<User> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.update, { tokens: { userToken }, data })
  }

  public async listUserBalances(userToken?: string, params?: TQueryParams): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.listBalances, {
      tokens: { userToken },
      params,
    })
  }

  public async listUserReceipts(userToken?: string, params?: TQueryParams): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(USER_ENDPOINTS.listReceipts, {
      tokens: { userToken },
      params,
    })
  }
}
