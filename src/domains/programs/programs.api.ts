import { asRaw, defineEndpoint, RequestDispatcher } from '../../core/dispatcher.ts'
import type { TJsonObject, TQueryParams } from '../../core/types.ts'

const ACCOUNT_PATH = 'programs/{programToken}/accounts/{accountToken}'

const PROGRAM_ENDPOINTS = {
  retrieveProgram: defineEndpoint({ method: 'GET', path: 'programs/{programToken}', wrap: asRaw }),
  retrieveAccount: defineEndpoint({ method: 'GET', path: ACCOUNT_PATH, wrap: asRaw }),
  listAccountBalances: defineEndpoint({
    method: 'GET',
    path: `${ACCOUNT_PATH}/balances` as const,
    wrap: asRaw,
  }),
  listAccountReceipts: defineEndpoint({
    method: 'GET',
    path: `${ACCOUNT_PATH}/receipts` as const,
    wrap: asRaw,
  }),
}

export type TProgramsApiOptions = {
  dispatcher: RequestDispatcher
}

/**
 * Programs and their accounts. These endpoints have no resource type, so the
 * decoded response is returned as is.
 */
export class ProgramsApi {
  private dispatcher: RequestDispatcher

  constructor(options: TProgramsApiOptions) {
    this.dispatcher = options.dispatcher
  }

  public async retrieveProgram(programToken?: string): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PROGRAM_ENDPOINTS.retrieveProgram, {
      tokens: { programToken },
    })
  }

  public async retrieveAccount(programToken?: string, accountToken?: string): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PROGRAM_ENDPOINTS.retrieveAccount, {
      tokens: { programToken, accountToken },
    })
  }

  public async listAccountBalances(
    programToken?: string,
    accountToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PROGRAM_ENDPOINTS.listAccountBalances, {
      tokens: { programToken, accountToken },
      params,
    })
  }

  public async listAccountReceipts(
    programToken?: string,
    accountToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PROGRAM_ENDPOINTS.listAccountReceipts, {
      tokens: { programToken, accountToken },
      params,
    })
  }
}
