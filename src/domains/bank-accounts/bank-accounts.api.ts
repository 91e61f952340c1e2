import { collect } from '../../core/collection.ts'
import {
  asList,
  asRaw,
  asResource,
  defineEndpoint,
  RequestDispatcher,
} from '../../core/dispatcher.ts'
import { BankAccount } from '../../core/resource.ts'
import type { TCollectionParams, TJsonObject, TPayload, TQueryParams } from '../../core/types.ts'
import { assertRequired } from '../../core/utils.ts'

const BANK_ACCOUNTS_PATH = 'users/{userToken}/bank-accounts'
const BANK_ACCOUNT_PATH = `${BANK_ACCOUNTS_PATH}/{bankAccountToken}` as const

const BANK_ACCOUNT_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: BANK_ACCOUNTS_PATH, wrap: asList(BankAccount) }),
  create: defineEndpoint({
    method: 'POST',
    path: BANK_ACCOUNTS_PATH,
    requiresData: true,
    wrap: asResource(BankAccount),
  }),
  retrieve: defineEndpoint({
    method: 'GET',
    path: BANK_ACCOUNT_PATH,
    wrap: asResource(BankAccount),
  }),
  update: defineEndpoint({
    method: 'PUT',
    path: BANK_ACCOUNT_PATH,
    requiresData: true,
    wrap: asResource(BankAccount),
  }),
  createStatusTransition: defineEndpoint({
    method: 'POST',
    path: `${BANK_ACCOUNT_PATH}/status-transitions` as const,
    requiresData: true,
    wrap: asRaw,
  }),
  retrieveStatusTransition: defineEndpoint({
    method: 'GET',
    path: `${BANK_ACCOUNT_PATH}/status-transitions/{statusTransitionToken}` as const,
    wrap: asRaw,
  }),
}

export type TBankAccountsApiOptions = {
  dispatcher: RequestDispatcher
}

/** Bank accounts registered as transfer methods of a user. */
export class BankAccountsApi {
  private dispatcher: RequestDispatcher

  constructor(options: TBankAccountsApiOptions) {
    this.dispatcher = options.dispatcher
  }

  /** Pages through `listBankAccounts` for one user. */
  public async getBankAccounts(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<BankAccount[]> {
    assertRequired('userToken', userToken)
    return await collect((pageParams) => this.listBankAccounts(userToken, pageParams), params)
  }

  public async listBankAccounts(userToken?: string, params?: TQueryParams): Promise<BankAccount[]> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.list, {
      tokens: { userToken },
      params,
    })
  }

  public async createBankAccount(userToken?: string, data?: TPayload): Promise<BankAccount> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.create, {
      tokens: { userToken },
      data,
    })
  }

  public async retrieveBankAccount(
    userToken?: string,
    bankAccountToken?: string,
  ): Promise<BankAccount> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.retrieve, {
      tokens: { userToken, bankAccountToken },
    })
  }

  public async updateBankAccount(
    userToken?: string,
    bankAccountToken?: string,
    data?: TPayload,
  ): Promise<BankAccount> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.update, {
      tokens: { userToken, bankAccountToken },
      data,
    })
  }

  public async createBankAccountStatusTransition(
    userToken?: string,
    bankAccountToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.createStatusTransition, {
      tokens: { userToken, bankAccountToken },
      data,
    })
  }

  public async retrieveBankAccountStatusTransition(
    userToken?: string,
    bankAccountToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(BANK_ACCOUNT_ENDPOINTS.retrieveStatusTransition, {
      tokens: { userToken, bankAccountToken, statusTransitionToken },
    })
  }
}
