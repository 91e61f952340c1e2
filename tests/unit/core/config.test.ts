import { describe, expect, it } from 'vitest'
import { DEFAULT_SERVER, loadConfigFromEnv, resolveClientConfig } from '../../../src/core/config.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { TEST_CONFIG } from '../../helpers/index.ts'

const credentials = {
  username: TEST_CONFIG.username,
  password: TEST_CONFIG.password,
  programToken: TEST_CONFIG.programToken,
}

describe('resolveClientConfig', () => {
  it('defaults the server to the sandbox', () => {
    expect(resolveClientConfig(credentials)).toEqual({ ...credentials, server: DEFAULT_SERVER })
    expect(DEFAULT_SERVER).toBe('https://api.sandbox.hyperwallet.com')
  })

  it('keeps a custom server', () => {
    expect(resolveClientConfig({ ...credentials, server: TEST_CONFIG.server }).server).toBe(
      TEST_CONFIG.server,
    )
  })

  it.each(['username', 'password', 'programToken'] as const)('requires %s', (key) => {
    expect(() => resolveClientConfig({ ...credentials, [key]: '' })).toThrow(
      new ConfigurationError(`${key} is required`),
    )
  })

  it('returns a frozen configuration', () => {
    expect(Object.isFrozen(resolveClientConfig(credentials))).toBe(true)
  })
})

describe('loadConfigFromEnv', () => {
  it('reads the HYPERWALLET_* variables', () => {
    const config = loadConfigFromEnv({
      HYPERWALLET_USERNAME: 'env-user',
      HYPERWALLET_PASSWORD: 'env-password',
      HYPERWALLET_PROGRAM_TOKEN: 'prg-env',
      HYPERWALLET_SERVER: 'https://uat.test.com',
    })

    expect(config).toEqual({
      username: 'env-user',
      password: 'env-password',
      programToken: 'prg-env',
      server: 'https://uat.test.com',
    })
  })

  it('fails when a credential is missing', () => {
    expect(() =>
      loadConfigFromEnv({ HYPERWALLET_USERNAME: 'env-user', HYPERWALLET_PASSWORD: 'p' }),
    ).toThrow('programToken is required')
  })
})
