import { describe, expect, it } from 'vitest'
import { InvalidArgumentError } from '../../../src/core/errors.ts'
import { User } from '../../../src/core/resource.ts'
import { createTestClient, makeUsers, servePages } from '../../helpers/index.ts'

describe('Hyperwallet.getUsers', () => {
  it('stops once maximum users have been read', async () => {
    const { client, transport } = createTestClient()
    const fixtures = makeUsers(250)
    servePages(transport, fixtures)

    const users = await client.getUsers({ maximum: 120 })

    expect(users).toHaveLength(120)
    expect(users.every((user) => user instanceof User)).toBe(true)
    expect(users.map((user) => user.token)).toEqual(
      fixtures.slice(0, 120).map((fixture) => fixture.token),
    )
    expect(transport.doGet.mock.calls).toEqual([
      ['users', { offset: 0, limit: 100 }],
      ['users', { offset: 100, limit: 100 }],
    ])
  })

  it('stops at the first short page', async () => {
    const { client, transport } = createTestClient()
    servePages(transport, makeUsers(50))

    const users = await client.getUsers({ maximum: 1000 })

    expect(users).toHaveLength(50)
    expect(transport.doGet).toHaveBeenCalledTimes(1)
  })

  it('reads every user when no maximum is given', async () => {
    const { client, transport } = createTestClient()
    servePages(transport, makeUsers(200))

    const users = await client.getUsers()

    expect(users).toHaveLength(200)
    expect(transport.doGet).toHaveBeenLastCalledWith('users', { offset: 200, limit: 100 })
  })

  it('returns nothing for a maximum below one', async () => {
    const { client, transport } = createTestClient()

    await expect(client.getUsers({ maximum: 0 })).resolves.toEqual([])
    expect(transport.doGet).not.toHaveBeenCalled()
  })

  it('rejects a negative offset', async () => {
    const { client } = createTestClient()

    await expect(client.getUsers({ offset: -5 })).rejects.toBeInstanceOf(InvalidArgumentError)
  })
})
