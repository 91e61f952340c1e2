import { collect } from '../../core/collection.ts'
import { asList, asResource, defineEndpoint, RequestDispatcher } from '../../core/dispatcher.ts'
import { Payment } from '../../core/resource.ts'
import type { TCollectionParams, TPayload, TQueryParams } from '../../core/types.ts'

const PAYMENT_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: 'payments', wrap: asList(Payment) }),
  create: defineEndpoint({
    method: 'POST',
    path: 'payments',
    requiresData: true,
    injectProgramToken: true,
    wrap: asResource(Payment),
  }),
  retrieve: defineEndpoint({
    method: 'GET',
    path: 'payments/{paymentToken}',
    wrap: asResource(Payment),
  }),
}

export type TPaymentsApiOptions = {
  dispatcher: RequestDispatcher
}

/** Thin client over the payments endpoints. */
export class PaymentsApi {
  private dispatcher: RequestDispatcher

  constructor(options: TPaymentsApiOptions) {
    this.dispatcher = options.dispatcher
  }

  public async getPayments(params?: TCollectionParams): Promise<Payment[]> {
    return await collect((pageParams) => this.listPayments(pageParams), params)
  }

  public async listPayments(params?: TQueryParams): Promise<Payment[]> {
    return await this.dispatcher.dispatch(PAYMENT_ENDPOINTS.list, { params })
  }

  /** Creates a payment under the client's program unless `data.programToken` is set. */
  public async createPayment(data?: TPayload): Promise<Payment> {
    return await this.dispatcher.dispatch(PAYMENT_ENDPOINTS.create, { data })
  }

  public async retrievePayment(paymentToken?: string): Promise<Payment> {
    return await this.dispatcher.dispatch(PAYMENT_ENDPOINTS.retrieve, {
      tokens: { paymentToken },
    })
  }
}
