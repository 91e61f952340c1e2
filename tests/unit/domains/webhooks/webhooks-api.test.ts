import { beforeEach, describe, expect, it } from 'vitest'
import { RequestDispatcher } from '../../../../src/core/dispatcher.ts'
import { Webhook } from '../../../../src/core/resource.ts'
import { WebhooksApi } from '../../../../src/domains/webhooks/webhooks.api.ts'
import {
  createMockTransport,
  makeWebhook,
  servePages,
  TEST_CONFIG,
  type TMockTransport,
} from '../../../helpers/index.ts'

describe('WebhooksApi', () => {
  let transport: TMockTransport
  let api: WebhooksApi

  beforeEach(() => {
    transport = createMockTransport()
    api = new WebhooksApi({
      dispatcher: new RequestDispatcher({ transport, programToken: TEST_CONFIG.programToken }),
    })
  })

  it('retrieves a notification', async () => {
    const fixture = makeWebhook({ type: 'PAYMENTS.CREATED' })
    transport.doGet.mockResolvedValue(fixture)

    const webhook = await api.retrieveWebhook(fixture.token)

    expect(transport.doGet).toHaveBeenCalledWith(
      `webhook-notifications/${fixture.token}`,
      undefined,
    )
    expect(webhook).toBeInstanceOf(Webhook)
    expect(webhook.get('type')).toBe('PAYMENTS.CREATED')
  })

  it('requires the webhook token', async () => {
    await expect(api.retrieveWebhook()).rejects.toThrow('webhookToken is required')
  })

  it('lists notifications with filters', async () => {
    await api.listWebhooks({ type: 'USERS.CREATED' })

    expect(transport.doGet).toHaveBeenCalledWith('webhook-notifications', {
      type: 'USERS.CREATED',
    })
  })

  it('collects every notification across pages', async () => {
    const fixtures = Array.from({ length: 130 }, () => makeWebhook())
    servePages(transport, fixtures)

    const webhooks = await api.getWebhooks()

    expect(webhooks).toHaveLength(130)
    expect(transport.doGet).toHaveBeenCalledTimes(2)
  })
})
