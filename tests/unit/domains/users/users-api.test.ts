import { beforeEach, describe, expect, it } from 'vitest'
import { RequestDispatcher } from '../../../../src/core/dispatcher.ts'
import { InvalidArgumentError } from '../../../../src/core/errors.ts'
import { User } from '../../../../src/core/resource.ts'
import { UsersApi } from '../../../../src/domains/users/users.api.ts'
import {
  createMockTransport,
  makeUser,
  makeUsers,
  servePages,
  TEST_CONFIG,
  type TMockTransport,
} from '../../../helpers/index.ts'

describe('UsersApi', () => {
  let transport: TMockTransport
  let api: UsersApi

  beforeEach(() => {
    transport = createMockTransport()
    api = new UsersApi({
      dispatcher: new RequestDispatcher({ transport, programToken: TEST_CONFIG.programToken }),
    })
  })

  describe('createUser', () => {
    it('injects the program token', async () => {
      const fixture = makeUser({ programToken: TEST_CONFIG.programToken })
      transport.doPost.mockResolvedValue(fixture)

      const user = await api.createUser({ clientUserId: 'c-1', profileType: 'INDIVIDUAL' })

      expect(transport.doPost).toHaveBeenCalledWith(
        'users',
        { clientUserId: 'c-1', profileType: 'INDIVIDUAL', programToken: 'prg-test' },
        undefined,
      )
      expect(user).toBeInstanceOf(User)
      expect(user.token).toBe(fixture.token)
    })

    it('keeps a program token set by the caller', async () => {
      await api.createUser({ clientUserId: 'c-1', programToken: 'prg-2' })

      expect(transport.doPost).toHaveBeenCalledWith(
        'users',
        { clientUserId: 'c-1', programToken: 'prg-2' },
        undefined,
      )
    })

    it('rejects an empty payload without sending', async () => {
      await expect(api.createUser({})).rejects.toThrow(new InvalidArgumentError('data'))
      expect(transport.doPost).not.toHaveBeenCalled()
    })
  })

  describe('retrieveUser', () => {
    it('reads users/{userToken}', async () => {
      transport.doGet.mockResolvedValue({ token: 'usr-1', email: 'ada@example.com' })

      const user = await api.retrieveUser('usr-1')

      expect(transport.doGet).toHaveBeenCalledWith('users/usr-1', undefined)
      expect(user.get('email')).toBe('ada@example.com')
    })

    it('requires the user token', async () => {
      await expect(api.retrieveUser(undefined)).rejects.toThrow('userToken is required')
      expect(transport.doGet).not.toHaveBeenCalled()
    })
  })

  describe('updateUser', () => {
    it('puts the payload without a program token', async () => {
      await api.updateUser('usr-1', { firstName: 'Ada' })

      expect(transport.doPut).toHaveBeenCalledWith('users/usr-1', { firstName: 'Ada' }, undefined)
    })

    it('checks the token before the payload', async () => {
      await expect(api.updateUser('', {})).rejects.toThrow('userToken is required')
    })
  })

  describe('listUsers', () => {
    it('forwards filters and wraps each entry', async () => {
      transport.doGet.mockResolvedValue({ data: [{ token: 'usr-1' }, { token: 'usr-2' }] })

      const users = await api.listUsers({ status: 'ACTIVATED' })

      expect(transport.doGet).toHaveBeenCalledWith('users', { status: 'ACTIVATED' })
      expect(users.map((user) => user.token)).toEqual(['usr-1', 'usr-2'])
    })

    it('returns an empty list when the response has no data', async () => {
      await expect(api.listUsers()).resolves.toEqual([])
    })
  })

  describe('getUsers', () => {
    it('pages until maximum is reached', async () => {
      const fixtures = makeUsers(250)
      servePages(transport, fixtures)

      const users = await api.getUsers({ maximum: 120, status: 'ACTIVATED' })

      expect(users).toHaveLength(120)
      expect(users[119].token).toBe(fixtures[119].token)
      expect(transport.doGet.mock.calls).toEqual([
        ['users', { status: 'ACTIVATED', offset: 0, limit: 100 }],
        ['users', { status: 'ACTIVATED', offset: 100, limit: 100 }],
      ])
    })
  })

  describe('balances and receipts', () => {
    it('returns the decoded body', async () => {
      transport.doGet.mockResolvedValue({ count: 1, data: [{ amount: '10.00' }] })

      await expect(api.listUserBalances('usr-1', { currency: 'USD' })).resolves.toEqual({
        count: 1,
        data: [{ amount: '10.00' }],
      })
      expect(transport.doGet).toHaveBeenCalledWith('users/usr-1/balances', { currency: 'USD' })
    })

    it('reads users/{userToken}/receipts', async () => {
      await api.listUserReceipts('usr-1')

      expect(transport.doGet).toHaveBeenCalledWith('users/usr-1/receipts', undefined)
    })

    it('requires the user token', async () => {
      await expect(api.listUserReceipts()).rejects.toThrow('userToken is required')
    })
  })
})
