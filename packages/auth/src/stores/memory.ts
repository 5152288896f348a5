import type { Account, AccountUpdate, CreateAccountInput } from '../models/account.js'
import { generateAccountId } from '../models/account.js'
import type { SecurityConfig } from '../models/security.js'
import { DEFAULT_SECURITY_CONFIG } from '../models/security.js'
import type { AccountStore, SecurityConfigStore } from './types.js'

/**
 * In-memory AccountStore implementation
 *
 * Suitable for testing and ephemeral controllers.
 */
export class InMemoryAccountStore implements AccountStore {
  private accounts = new Map<string, Account>()

  async create(input: CreateAccountInput): Promise<Account> {
    if (await this.findByUsername(input.username)) {
      throw new Error(`Account "${input.username}" already exists`)
    }
    const now = new Date()
    const account: Account = {
      ...input,
      id: generateAccountId(),
      createdAt: now,
      updatedAt: now,
    }
    this.accounts.set(account.id, account)
    return account
  }

  async findById(id: string): Promise<Account | null> {
    return this.accounts.get(id) ?? null
  }

  async findByUsername(username: string): Promise<Account | null> {
    for (const account of this.accounts.values()) {
      if (account.username === username) {
        return account
      }
    }
    return null
  }

  async update(id: string, updates: AccountUpdate): Promise<Account> {
    const account = this.accounts.get(id)
    if (!account) {
      throw new Error('Account not found')
    }
    const updated = { ...account, ...updates, updatedAt: new Date() }
    this.accounts.set(id, updated)
    return updated
  }

  async delete(id: string): Promise<void> {
    this.accounts.delete(id)
  }

  async list(): Promise<Account[]> {
    return Array.from(this.accounts.values())
  }
}

/**
 * In-memory SecurityConfigStore implementation
 */
export class InMemorySecurityConfigStore implements SecurityConfigStore {
  private config: SecurityConfig | null = null

  async get(): Promise<SecurityConfig> {
    return this.config ?? { ...DEFAULT_SECURITY_CONFIG }
  }

  async set(config: SecurityConfig): Promise<void> {
    this.config = { ...config }
  }
}
