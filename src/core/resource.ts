import type { TJsonObject, TJsonValue } from './types.ts'

export type TResourceKind =
  | 'user'
  | 'bank-account'
  | 'prepaid-card'
  | 'paper-check'
  | 'payment'
  | 'webhook'

export type TResourceConstructor<R extends Resource> = new (fields?: TJsonObject) => R

function deepFreeze(value: TJsonValue): void {
  if (typeof value !== 'object' || value === null) return
  Object.freeze(value)
  for (const nested of Object.values(value)) deepFreeze(nested)
}

/**
 * Read-only view over a decoded API response. Fields are looked up by name and
 * are not checked against any schema; a field the API did not send is `undefined`.
 */
export abstract class Resource {
  abstract readonly kind: TResourceKind
  private readonly fields: TJsonObject

  constructor(fields: TJsonObject = {}) {
    const copy: TJsonObject = structuredClone(fields)
    deepFreeze(copy)
    this.fields = copy
  }

  get(field: string): TJsonValue | undefined {
    return Object.hasOwn(this.fields, field) ? this.fields[field] : undefined
  }

  has(field: string): boolean {
    return Object.hasOwn(this.fields, field)
  }

  keys(): string[] {
    return Object.keys(this.fields)
  }

  /** The `token` field every API resource carries, if present. */
  get token(): string | undefined {
    const token = this.get('token')
    return typeof token === 'string' ? token : undefined
  }

  toJSON(): TJsonObject {
    return structuredClone(this.fields)
  }
}

export class User extends Resource {
  readonly kind = 'user'
}

export class BankAccount extends Resource {
  readonly kind = 'bank-account'
}

export class PrepaidCard extends Resource {
  readonly kind = 'prepaid-card'
}

export class PaperCheck extends Resource {
  readonly kind = 'paper-check'
}

export class Payment extends Resource {
  readonly kind = 'payment'
}

export class Webhook extends Resource {
  readonly kind = 'webhook'
}
