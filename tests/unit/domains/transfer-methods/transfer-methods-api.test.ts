import { beforeEach, describe, expect, it } from 'vitest'
import { RequestDispatcher } from '../../../../src/core/dispatcher.ts'
import {
  CACHE_TOKEN_HEADER,
  TransferMethodsApi,
} from '../../../../src/domains/transfer-methods/transfer-methods.api.ts'
import { createMockTransport, TEST_CONFIG, type TMockTransport } from '../../../helpers/index.ts'

describe('TransferMethodsApi', () => {
  let transport: TMockTransport
  let api: TransferMethodsApi

  const configurationQuery = {
    userToken: 'usr-1',
    country: 'US',
    currency: 'USD',
    type: 'BANK_ACCOUNT',
    profileType: 'INDIVIDUAL',
  }

  beforeEach(() => {
    transport = createMockTransport()
    api = new TransferMethodsApi({
      dispatcher: new RequestDispatcher({ transport, programToken: TEST_CONFIG.programToken }),
    })
  })

  describe('listTransferMethodConfigurations', () => {
    it('sends the user token as a query parameter', async () => {
      await api.listTransferMethodConfigurations({ userToken: 'usr-1', limit: 10 })

      expect(transport.doGet).toHaveBeenCalledWith('transfer-method-configurations', {
        userToken: 'usr-1',
        limit: 10,
      })
    })

    it('requires the user token', async () => {
      await expect(api.listTransferMethodConfigurations()).rejects.toThrow('userToken is required')
      expect(transport.doGet).not.toHaveBeenCalled()
    })
  })

  describe('retrieveTransferMethodConfiguration', () => {
    it('sends every key as a query parameter', async () => {
      transport.doGet.mockResolvedValue({ fields: [] })

      await expect(api.retrieveTransferMethodConfiguration(configurationQuery)).resolves.toEqual({
        fields: [],
      })
      expect(transport.doGet).toHaveBeenCalledWith(
        'transfer-method-configurations',
        configurationQuery,
      )
    })

    it.each(['userToken', 'country', 'currency', 'type', 'profileType'])(
      'requires %s',
      async (key) => {
        await expect(
          api.retrieveTransferMethodConfiguration({ ...configurationQuery, [key]: '' }),
        ).rejects.toThrow(`${key} is required`)
      },
    )
  })

  describe('createTransferMethod', () => {
    it('sends the cache token as a header', async () => {
      transport.doPost.mockResolvedValue({ token: 'trm-7' })

      const created = await api.createTransferMethod('usr-1', 'cache-1', { bankId: '001' })

      expect(created).toEqual({ token: 'trm-7' })
      expect(transport.doPost).toHaveBeenCalledWith(
        'users/usr-1/transfer-methods',
        { bankId: '001' },
        { [CACHE_TOKEN_HEADER]: 'cache-1' },
      )
    })

    it('allows an empty payload', async () => {
      await api.createTransferMethod('usr-1', 'cache-1')

      expect(transport.doPost).toHaveBeenCalledWith('users/usr-1/transfer-methods', undefined, {
        'Json-Cache-Token': 'cache-1',
      })
    })

    it('checks the user token before the cache token', async () => {
      await expect(api.createTransferMethod(undefined, undefined)).rejects.toThrow(
        'userToken is required',
      )
      await expect(api.createTransferMethod('usr-1', '')).rejects.toThrow(
        'cacheToken is required',
      )
      expect(transport.doPost).not.toHaveBeenCalled()
    })
  })
})
