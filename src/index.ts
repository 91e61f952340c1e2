// Main client
export { Hyperwallet } from './client/hyperwallet.ts'
export type { THyperwalletOptions } from './client/hyperwallet.ts'

// Configuration
export { DEFAULT_SERVER, loadConfigFromEnv } from './core/config.ts'
export type { TClientConfig, TCredentials } from './core/config.ts'

// Transport (for custom transports / advanced usage)
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'

// Resources
export {
  Resource,
  User,
  BankAccount,
  PrepaidCard,
  PaperCheck,
  Payment,
  Webhook,
} from './core/resource.ts'
export type { TResourceKind } from './core/resource.ts'

// Pagination
export { COLLECTION_CHUNK_SIZE, collect, getCollection } from './core/collection.ts'
export type { TCollectionSlice, TFetchPage } from './core/collection.ts'

// Errors
export {
  ConfigurationError,
  InvalidArgumentError,
  AuthError,
  APIError,
  TimeoutError,
  AbortOperationError,
} from './core/errors.ts'
export type { TApiErrorDetail } from './core/errors.ts'

// Types
export type {
  THttpMethod,
  THttpTransport,
  THeaders,
  TJsonObject,
  TJsonValue,
  TPayload,
  TQueryParams,
  TCollectionParams,
  TRetryPolicy,
} from './core/types.ts'
