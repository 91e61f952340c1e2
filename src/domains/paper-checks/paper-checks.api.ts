import { collect } from '../../core/collection.ts'
import {
  asList,
  asRaw,
  asResource,
  defineEndpoint,
  RequestDispatcher,
} from '../../core/dispatcher.ts'
import { PaperCheck } from '../../core/resource.ts'
import type { TCollectionParams, TJsonObject, TPayload, TQueryParams } from '../../core/types.ts'
import { assertRequired } from '../../core/utils.ts'

const PAPER_CHECKS_PATH = 'users/{userToken}/paper-checks'
const PAPER_CHECK_PATH = `${PAPER_CHECKS_PATH}/{paperCheckToken}` as const

const PAPER_CHECK_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: PAPER_CHECKS_PATH, wrap: asList(PaperCheck) }),
  create: defineEndpoint({
    method: 'POST',
    path: PAPER_CHECKS_PATH,
    requiresData: true,
    wrap: asResource(PaperCheck),
  }),
  retrieve: defineEndpoint({ method: 'GET', path: PAPER_CHECK_PATH, wrap: asResource(PaperCheck) }),
  update: defineEndpoint({
    method: 'PUT',
    path: PAPER_CHECK_PATH,
    requiresData: true,
    wrap: asResource(PaperCheck),
  }),
  createStatusTransition: defineEndpoint({
    method: 'POST',
    path: `${PAPER_CHECK_PATH}/status-transitions` as const,
    requiresData: true,
    wrap: asRaw,
  }),
  retrieveStatusTransition: defineEndpoint({
    method: 'GET',
    path: `${PAPER_CHECK_PATH}/status-transitions/{statusTransitionToken}` as const,
    wrap: asRaw,
  }),
}

export type TPaperChecksApiOptions = {
  dispatcher: RequestDispatcher
}

export class PaperChecksApi {
  private dispatcher: RequestDispatcher

  constructor(options: TPaperChecksApiOptions) {
    this.dispatcher = options.dispatcher
  }

  public async getPaperChecks(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<PaperCheck[]> {
    assertRequired('userToken', userToken)
    return await collect((pageParams) => this.listPaperChecks(userToken, pageParams), params)
  }

  public async listPaperChecks(userToken?: string, params?: TQueryParams): Promise<PaperCheck[]> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.list, {
      tokens: { userToken },
      params,
    })
  }

  public async createPaperCheck(userToken?: string, data?: TPayload): Promise<PaperCheck> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.create, {
      tokens: { userToken },
      data,
    })
  }

  public async retrievePaperCheck(userToken?: string, paperCheckToken?: string): Promise<PaperCheck> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.retrieve, {
      tokens: { userToken, paperCheckToken },
    })
  }

  public async updatePaperCheck(
    userToken?: string,
    paperCheckToken?: string,
    data?: TPayload,
  ): Promise<PaperCheck> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.update, {
      tokens: { userToken, paperCheckToken },
      data,
    })
  }

  public async createPaperCheckStatusTransition(
    userToken?: string,
    paperCheckToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.createStatusTransition, {
      tokens: { userToken, paperCheckToken },
      data,
    })
  }

  public async retrievePaperCheckStatusTransition(
    userToken?: string,
    paperCheckToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.dispatcher.dispatch(PAPER_CHECK_ENDPOINTS.retrieveStatusTransition, {
      tokens: { userToken, paperCheckToken, statusTransitionToken },
    })
  }
}
