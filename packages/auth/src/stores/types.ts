import type { Account, AccountUpdate, CreateAccountInput } from '../models/account.js'
import type { SecurityConfig } from '../models/security.js'

/**
 * AccountStore interface - persistence for Account entities
 */
export interface AccountStore {
  create(account: CreateAccountInput): Promise<Account>
  findById(id: string): Promise<Account | null>
  findByUsername(username: string): Promise<Account | null>
  update(id: string, updates: AccountUpdate): Promise<Account>
  delete(id: string): Promise<void>
  list(): Promise<Account[]>
}

/**
 * SecurityConfigStore interface - persistence for the singleton SecurityConfig
 */
export interface SecurityConfigStore {
  /** Returns the stored config, or the defaults of an unconfigured controller. */
  get(): Promise<SecurityConfig>
  set(config: SecurityConfig): Promise<void>
}
