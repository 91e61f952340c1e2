import {
  loadConfigFromEnv,
  resolveClientConfig,
  type TClientConfig,
  type TCredentials,
} from '../core/config.ts'
import { RequestDispatcher } from '../core/dispatcher.ts'
import type {
  BankAccount,
  PaperCheck,
  Payment,
  PrepaidCard,
  User,
  Webhook,
} from '../core/resource.ts'
import { Transport } from '../core/transport.ts'
import type {
  TCollectionParams,
  THttpTransport,
  TJsonObject,
  TPayload,
  TQueryParams,
  TRetryPolicy,
} from '../core/types.ts'
import { BankAccountsApi } from '../domains/bank-accounts/bank-accounts.api.ts'
import { PaperChecksApi } from '../domains/paper-checks/paper-checks.api.ts'
import { PaymentsApi } from '../domains/payments/payments.api.ts'
import { PrepaidCardsApi } from '../domains/prepaid-cards/prepaid-cards.api.ts'
import { ProgramsApi } from '../domains/programs/programs.api.ts'
import { TransferMethodsApi } from '../domains/transfer-methods/transfer-methods.api.ts'
import { UsersApi } from '../domains/users/users.api.ts'
import { WebhooksApi } from '../domains/webhooks/webhooks.api.ts'

export type THyperwalletOptions = TCredentials & {
  /** Per-request timeout of the default transport */
  timeoutInMilliseconds?: number
  /** Retry policy of the default transport */
  retryPolicy?: TRetryPolicy
  /** Optional fetch implementation for the default transport */
  fetchImplementation?: typeof fetch
  /** Replaces the default transport entirely */
  transport?: THttpTransport
}

/**
 * Client for the Hyperwallet REST API.
 *
 * Every operation checks its required arguments before anything is sent and
 * throws InvalidArgumentError naming the first missing one. `get*` operations
 * page through the matching `list*` operation; `offset` and `maximum` slice the
 * combined result.
 *
 * @example
 * ```typescript
 * const client = new Hyperwallet({
 *   username: 'api-user',
 *   password: 'api-password',
 *   programToken: 'prg-1234',
 * })
 *
 * const user = await client.createUser({ clientUserId: 'c-1', profileType: 'INDIVIDUAL' })
 * const firstTwoHundred = await client.getUsers({ maximum: 200 })
 * ```
 */
export class Hyperwallet {
  protected readonly config: TClientConfig
  private usersApi: UsersApi
  private bankAccountsApi: BankAccountsApi
  private prepaidCardsApi: PrepaidCardsApi
  private paperChecksApi: PaperChecksApi
  private paymentsApi: PaymentsApi
  private programsApi: ProgramsApi
  private transferMethodsApi: TransferMethodsApi
  private webhooksApi: WebhooksApi

  constructor(options: THyperwalletOptions) {
    this.config = resolveClientConfig(options)

    const transport: THttpTransport =
      options.transport ??
      new Transport({
        server: this.config.server,
        username: this.config.username,
        password: this.config.password,
        retryPolicy: options.retryPolicy,
        timeoutInMilliseconds: options.timeoutInMilliseconds,
        fetchImplementation: options.fetchImplementation,
      })
    const dispatcher = new RequestDispatcher({
      transport,
      programToken: this.config.programToken,
    })

    this.usersApi = new UsersApi({ dispatcher })
    this.bankAccountsApi = new BankAccountsApi({ dispatcher })
    this.prepaidCardsApi = new PrepaidCardsApi({ dispatcher })
    this.paperChecksApi = new PaperChecksApi({ dispatcher })
    this.paymentsApi = new PaymentsApi({ dispatcher })
    this.programsApi = new ProgramsApi({ dispatcher })
    this.transferMethodsApi = new TransferMethodsApi({ dispatcher })
    this.webhooksApi = new WebhooksApi({ dispatcher })
  }

  /**
   * Builds a client from HYPERWALLET_* environment variables. Other options, such as
   * a custom transport, can be passed alongside.
   */
  public static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: Omit<THyperwalletOptions, keyof TCredentials> = {},
  ): Hyperwallet {
    return new Hyperwallet({ ...options, ...loadConfigFromEnv(env) })
  }

  /** Program token injected into `createUser` and `createPayment` payloads. */
  public get programToken(): string {
    return this.config.programToken
  }

  // Users

  public async getUsers(params?: TCollectionParams): Promise<User[]> {
    return await this.usersApi.getUsers(params)
  }

  public async listUsers(params?: TQueryParams): Promise<User[]> {
    return await this.usersApi.listUsers(params)
  }

  public async createUser(data?: TPayload): Promise<User> {
    return await this.usersApi.createUser(data)
  }

  public async retrieveUser(userToken?: string): Promise<User> {
    return await this.usersApi.retrieveUser(userToken)
  }

  public async updateUser(userToken?: string, data?: TPayload): Promise<User> {
    return await this.usersApi.updateUser(userToken, data)
  }

  public async listUserBalances(userToken?: string, params?: TQueryParams): Promise<TJsonObject> {
    return await this.usersApi.listUserBalances(userToken, params)
  }

  public async listUserReceipts(userToken?: string, params?: TQueryParams): Promise<TJsonObject> {
    return await this.usersApi.listUserReceipts(userToken, params)
  }

  // Bank accounts

  public async getBankAccounts(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<BankAccount[]> {
    return await this.bankAccountsApi.getBankAccounts(userToken, params)
  }

  public async listBankAccounts(userToken?: string, params?: TQueryParams): Promise<BankAccount[]> {
    return await this.bankAccountsApi.listBankAccounts(userToken, params)
  }

  public async createBankAccount(userToken?: string, data?: TPayload): Promise<BankAccount> {
    return await this.bankAccountsApi.createBankAccount(userToken, data)
  }

  public async retrieveBankAccount(
    userToken?: string,
    bankAccountToken?: string,
  ): Promise<BankAccount> {
    return await this.bankAccountsApi.retrieveBankAccount(userToken, bankAccountToken)
  }

  public async updateBankAccount(
    userToken?: string,
    bankAccountToken?: string,
    data?: TPayload,
  ): Promise<BankAccount> {
    return await this.bankAccountsApi.updateBankAccount(userToken, bankAccountToken, data)
  }

  public async createBankAccountStatusTransition(
    userToken?: string,
    bankAccountToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.bankAccountsApi.createBankAccountStatusTransition(
      userToken,
      bankAccountToken,
      data,
    )
  }

  public async retrieveBankAccountStatusTransition(
    userToken?: string,
    bankAccountToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.bankAccountsApi.retrieveBankAccountStatusTransition(
      userToken,
      bankAccountToken,
      statusTransitionToken,
    )
  }

  // Prepaid cards

  public async getPrepaidCards(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<PrepaidCard[]> {
    return await this.prepaidCardsApi.getPrepaidCards(userToken, params)
  }

  public async listPrepaidCards(userToken?: string, params?: TQueryParams): Promise<PrepaidCard[]> {
    return await this.prepaidCardsApi.listPrepaidCards(userToken, params)
  }

  public async createPrepaidCard(userToken?: string, data?: TPayload): Promise<PrepaidCard> {
    return await this.prepaidCardsApi.createPrepaidCard(userToken, data)
  }

  public async retrievePrepaidCard(
    userToken?: string,
    prepaidCardToken?: string,
  ): Promise<PrepaidCard> {
    return await this.prepaidCardsApi.retrievePrepaidCard(userToken, prepaidCardToken)
  }

  public async listPrepaidCardStatusTransitions(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.prepaidCardsApi.listPrepaidCardStatusTransitions(
      userToken,
      prepaidCardToken,
      params,
    )
  }

  public async createPrepaidCardStatusTransition(
    userToken?: string,
    prepaidCardToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.prepaidCardsApi.createPrepaidCardStatusTransition(
      userToken,
      prepaidCardToken,
      data,
    )
  }

  public async retrievePrepaidCardStatusTransition(
    userToken?: string,
    prepaidCardToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.prepaidCardsApi.retrievePrepaidCardStatusTransition(
      userToken,
      prepaidCardToken,
      statusTransitionToken,
    )
  }

  public async listPrepaidCardBalances(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.prepaidCardsApi.listPrepaidCardBalances(userToken, prepaidCardToken, params)
  }

  public async listPrepaidCardReceipts(
    userToken?: string,
    prepaidCardToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.prepaidCardsApi.listPrepaidCardReceipts(userToken, prepaidCardToken, params)
  }

  // Paper checks

  public async getPaperChecks(
    userToken?: string,
    params?: TCollectionParams,
  ): Promise<PaperCheck[]> {
    return await this.paperChecksApi.getPaperChecks(userToken, params)
  }

  public async listPaperChecks(userToken?: string, params?: TQueryParams): Promise<PaperCheck[]> {
    return await this.paperChecksApi.listPaperChecks(userToken, params)
  }

  public async createPaperCheck(userToken?: string, data?: TPayload): Promise<PaperCheck> {
    return await this.paperChecksApi.createPaperCheck(userToken, data)
  }

  public async retrievePaperCheck(userToken?: string, paperCheckToken?: string): Promise<PaperCheck> {
    return await this.paperChecksApi.retrievePaperCheck(userToken, paperCheckToken)
  }

  public async updatePaperCheck(
    userToken?: string,
    paperCheckToken?: string,
    data?: TPayload,
  ): Promise<PaperCheck> {
    return await this.paperChecksApi.updatePaperCheck(userToken, paperCheckToken, data)
  }

  public async createPaperCheckStatusTransition(
    userToken?: string,
    paperCheckToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.paperChecksApi.createPaperCheckStatusTransition(
      userToken,
      paperCheckToken,
      data,
    )
  }

  public async retrievePaperCheckStatusTransition(
    userToken?: string,
    paperCheckToken?: string,
    statusTransitionToken?: string,
  ): Promise<TJsonObject> {
    return await this.paperChecksApi.retrievePaperCheckStatusTransition(
      userToken,
      paperCheckToken,
      statusTransitionToken,
    )
  }

  // Payments

  public async getPayments(params?: TCollectionParams): Promise<Payment[]> {
    return await this.paymentsApi.getPayments(params)
  }

  public async listPayments(params?: TQueryParams): Promise<Payment[]> {
    return await this.paymentsApi.listPayments(params)
  }

  public async createPayment(data?: TPayload): Promise<Payment> {
    return await this.paymentsApi.createPayment(data)
  }

  public async retrievePayment(paymentToken?: string): Promise<Payment> {
    return await this.paymentsApi.retrievePayment(paymentToken)
  }

  // Programs and accounts

  public async retrieveProgram(programToken?: string): Promise<TJsonObject> {
    return await this.programsApi.retrieveProgram(programToken)
  }

  public async retrieveAccount(programToken?: string, accountToken?: string): Promise<TJsonObject> {
    return await this.programsApi.retrieveAccount(programToken, accountToken)
  }

  public async listAccountBalances(
    programToken?: string,
    accountToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.programsApi.listAccountBalances(programToken, accountToken, params)
  }

  public async listAccountReceipts(
    programToken?: string,
    accountToken?: string,
    params?: TQueryParams,
  ): Promise<TJsonObject> {
    return await this.programsApi.listAccountReceipts(programToken, accountToken, params)
  }

  // Transfer methods

  public async listTransferMethodConfigurations(params?: TQueryParams): Promise<TJsonObject> {
    return await this.transferMethodsApi.listTransferMethodConfigurations(params)
  }

  public async retrieveTransferMethodConfiguration(params?: TQueryParams): Promise<TJsonObject> {
    return await this.transferMethodsApi.retrieveTransferMethodConfiguration(params)
  }

  public async createTransferMethod(
    userToken?: string,
    cacheToken?: string,
    data?: TPayload,
  ): Promise<TJsonObject> {
    return await this.transferMethodsApi.createTransferMethod(userToken, cacheToken, data)
  }

  // Webhook notifications

  public async getWebhooks(params?: TCollectionParams): Promise<Webhook[]> {
    return await this.webhooksApi.getWebhooks(params)
  }

  public async listWebhooks(params?: TQueryParams): Promise<Webhook[]> {
    return await this.webhooksApi.listWebhooks(params)
  }

  public async retrieveWebhook(webhookToken?: string): Promise<Webhook> {
    return await this.webhooksApi.retrieveWebhook(webhookToken)
  }
}
