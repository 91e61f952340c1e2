import { collect } from '../../core/collection.ts'
import { asList, asResource, defineEndpoint, RequestDispatcher } from '../../core/dispatcher.ts'
import { Webhook } from '../../core/resource.ts'
import type { TCollectionParams, TQueryParams } from '../../core/types.ts'

const WEBHOOK_ENDPOINTS = {
  list: defineEndpoint({ method: 'GET', path: 'webhook-notifications', wrap: asList(Webhook) }),
  retrieve: defineEndpoint({
    method: 'GET',
    path: 'webhook-notifications/{webhookToken}',
    wrap: asResource(Webhook),
  }),
}

export type TWebhooksApiOptions = {
  dispatcher: RequestDispatcher
}

/** Webhook notifications the API has sent for the program. */
export class WebhooksApi {
  private dispatcher: RequestDispatcher

  constructor(options: TWebhooksApiOptions) {
    this.dispatcher = options.dispatcher
  }

  public async getWebhooks(params?: TCollectionParams): Promise<Webhook[]> {
    return await collect((pageParams) => this.listWebhooks(pageParams), params)
  }

  public async listWebhooks(params?: TQueryParams): Promise<Webhook[]> {
    return await this.dispatcher.dispatch(WEBHOOK_ENDPOINTS.list, { params })
  }

  public async retrieveWebhook(webhookToken?: string): Promise<Webhook> {
    return await this.dispatcher.dispatch(WEBHOOK_ENDPOINTS.retrieve, {
      tokens: { webhookToken },
    })
  }
}
