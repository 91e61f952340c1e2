import { collect } from '../../core/collection.ts'
import {
  asList,
  asRaw,
  asResource,
  defineEndpoint,
  RequestDispatcher,
} from '../../core/dispatcher.ts'
import { PrepaidCard } from '../../core/resource.ts'
import type { TCollectionParams, TJsonObject, TPayload, TQueryParams } from '../../core/types.ts'
import { assertRequired } from '../../core/utils.ts'

const PREPAID_CARDS_PATH = 'users/{userToken}/prepaid-cards'
const PREPAID_CARD_PATH = `${PREPAID_CARDS_PATH}/{prepaidCardToken}` as const
const STATUS_TRANSITIONS_PATH = `${PREPAID_CARD_PATH}/status-transitions` as const

const PREPAID_CARD_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: PREPAID_CARDS_PATH, wrap: asList(PrepaidCard) }),
  create: defineEndpoint({
    method: 'POST',
    path: PREPAID_CARDS_PATH,
    requiresData: true,
    wrap: asResource(PrepaidCard),
  }),
  retrieve: defineEndpoint({
    method: 'GET',
    path: PREPAID_CARD_PATH,
    wrap: asResource(PrepaidCard),
  }),
  listStatusTransitions: defineEndpoint({
    method: 'GET',
    path: STATUS_TRANSITIONS_PATH,
    wrap: asRaw,
  }),
  createStatusTransition: defineEndpoint({
    method: 'POST',
    path: STATUS_TRANSITIONS_PATH,
    requiresData: true,
    wrap: asRaw,
  }),
  retrieveStatusTransition: defineEndpoint({
    method: 'GET',
    path: `${STATUS_TRANSITIONS_PATH}/{statusTransitionToken}` as const,
    wrap: asRaw,
  }),
  listBalances: defineEndpoint({
    method: 'GET',
    path: `${PREPAID_CARD_PATH}/balances` as const,
    wrap: asRaw,
  }),
  listReceipts: defineEndpoint({
    method: 'GET',
    path: `${PREPAID_CARD_PATH}/receipts` as const,
    wrap: asRaw,
  }),
}

export type TPrepaidCardsApiOptions = {
  dispatcher: RequestDispatcher
}

export class PrepaidCardsApi {
  private dispatcher: RequestDispatcher

  constructor(options: TPrepaidCardsApiOptions) {
    this.dispatcher = options.dispatcher
  }

  /** Pages through `listPrepaidCards` for one user. */
  public async getPrepaidCards(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<PrepaidCard[]> {
    assertRequired('userToken', userToken)
    return await collect((pageParams) => this.listPrepaidCards(userToken, pageParams), params)
  }

  public async listPrepaidCards(userToken?: string, params?: TQueryParams): Promise<PrepaidCard[]> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.list, {
      tokens: { userToken },
      params,
    })
  }

  public async createPrepaidCard(userToken?: string, data?: TPayload): Promise<PrepaidCard> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.create, {
      tokens: { userToken },
      data,
    })
  }

  public async retrievePrepaidCard(
    userToken?: string,
    prepaidCardToken?: string,
  ): Promise<PrepaidCard> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.retrieve, {
      tokens: { userToken, prepaidCardToken },
    })
  }

  public async listPrepaidCardStatusTransitions(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.listStatusTransitions, {
      tokens: { userToken, prepaidCardToken },
      params,
    })
  }

  /** Activates, locks, unlocks or decommissions a card, depending on `transition`. */
  public async createPrepaidCardStatusTransition(
    userToken?: string,
    prepaidCardToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.createStatusTransition, {
      tokens: { userToken, prepaidCardToken },
      data,
    })
  }

  public async retrievePrepaidCardStatusTransition(
    userToken?: string,
    prepaidCardToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.retrieveStatusTransition, {
      tokens: { userToken, prepaidCardToken, statusTransitionToken },
    })
  }

  public async listPrepaidCardBalances(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.listBalances, {
      tokens: { userToken, prepaidCardToken },
      params,
    })
  }

  public async listPrepaidCardReceipts(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PREPAID_CARD_ENDPOINTS.listReceipts, {
      tokens: { userToken, prepaidCardToken },
      params,
    })
  }
}
