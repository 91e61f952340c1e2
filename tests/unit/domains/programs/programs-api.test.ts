import { beforeEach, describe, expect, it } from 'vitest'
import { RequestDispatcher } from '../../../../src/core/dispatcher.ts'
import { ProgramsApi } from '../../../../src/domains/programs/programs.api.ts'
import { createMockTransport, TEST_CONFIG, type TMockTransport } from '../../../helpers/index.ts'

describe('ProgramsApi', () => {
  let transport: TMockTransport
  let api: ProgramsApi

  beforeEach(() => {
    transport = createMockTransport()
    api = new ProgramsApi({
      dispatcher: new RequestDispatcher({ transport, programToken: TEST_CONFIG.programToken }),
    })
  })

  it('returns the program as decoded', async () => {
    transport.doGet.mockResolvedValue({ token: 'prg-1', name: 'Payouts' })

    await expect(api.retrieveProgram('prg-1')).resolves.toEqual({
      token: 'prg-1',
      name: 'Payouts',
    })
    expect(transport.doGet).toHaveBeenCalledWith('programs/prg-1', undefined)
  })

  it('addresses accounts under the program', async () => {
    await api.retrieveAccount('prg-1', 'act-1')
    await api.listAccountBalances('prg-1', 'act-1', { currency: 'USD' })
    await api.listAccountReceipts('prg-1', 'act-1')

    expect(transport.doGet.mock.calls).toEqual([
      ['programs/prg-1/accounts/act-1', undefined],
      ['programs/prg-1/accounts/act-1/balances', { currency: 'USD' }],
      ['programs/prg-1/accounts/act-1/receipts', undefined],
    ])
  })

  it('does not fall back to the client program token', async () => {
    await expect(api.retrieveProgram()).rejects.toThrow('programToken is required')
    await expect(api.retrieveAccount('prg-1')).rejects.toThrow('accountToken is required')
    expect(transport.doGet).not.toHaveBeenCalled()
  })
})
