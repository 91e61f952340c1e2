import { validateRequiredStrings } from './utils.ts'

/** Hyperwallet sandbox. Use your UAT or production server in the `server` option. */
export const DEFAULT_SERVER = 'https://api.sandbox.hyperwallet.com'

export const API_BASE_PATH = '/rest/v3'

export type TCredentials = {
  /** API username */
  username: string
  /** API password */
  password: string
  /** Program the client works on; injected into create requests that omit one */
  programToken: string
  /** Server URL, defaults to the sandbox */
  server?: string
}

export type TClientConfig = Readonly<Required<TCredentials>>

/** Validates credentials and fills in defaults. Throws ConfigurationError on a missing credential. */
export function resolveClientConfig(credentials: TCredentials): TClientConfig {
  validateRequiredStrings(credentials, ['username', 'password', 'programToken'])
  return Object.freeze({
    username: credentials.username,
    password: credentials.password,
    programToken: credentials.programToken,
    server: credentials.server || DEFAULT_SERVER,
  })
}

/**
 * Reads credentials from HYPERWALLET_USERNAME, HYPERWALLET_PASSWORD,
 * HYPERWALLET_PROGRAM_TOKEN and the optional HYPERWALLET_SERVER.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TClientConfig {
  return resolveClientConfig({
    username: env.HYPERWALLET_USERNAME ?? '',
    password: env.HYPERWALLET_PASSWORD ?? '',
    programToken: env.HYPERWALLET_PROGRAM_TOKEN ?? '',
    server: env.HYPERWALLET_SERVER,
  })
}
