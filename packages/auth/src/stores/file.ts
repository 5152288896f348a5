import { join } from 'node:path'
import { z } from 'zod'
import type { Account, AccountUpdate, CreateAccountInput } from '../models/account.js'
import { AccountSchema, generateAccountId } from '../models/account.js'
import type { SecurityConfig } from '../models/security.js'
import { DEFAULT_SECURITY_CONFIG, SecurityConfigSchema } from '../models/security.js'
import { readJsonFile, withFileQueue, writeJsonFile } from './json-file.js'
import type { AccountStore, SecurityConfigStore } from './types.js'

const AccountsDocumentSchema = z.object({
  accounts: z.array(AccountSchema),
})

/**
 * FileAccountStore - accounts persisted under the controller home
 *
 * Stored as `{home}/accounts.json` (mode 0600). Every operation re-reads the
 * file, so several store instances over the same home stay consistent.
 * Mutations are queued per file: concurrent updates apply one after another.
 */
export class FileAccountStore implements AccountStore {
  readonly path: string

  constructor(home: string) {
    this.path = join(home, 'accounts.json')
  }

  private async load(): Promise<Account[]> {
    const doc = await readJsonFile(this.path, AccountsDocumentSchema)
    return doc?.accounts ?? []
  }

  private async save(accounts: Account[]): Promise<void> {
    await writeJsonFile(this.path, { accounts })
  }

  async create(input: CreateAccountInput): Promise<Account> {
    return withFileQueue(this.path, () => this.doCreate(input))
  }

  private async doCreate(input: CreateAccountInput): Promise<Account> {
    const accounts = await this.load()
    if (accounts.some((a) => a.username === input.username)) {
      throw new Error(`Account "${input.username}" already exists`)
    }
    const now = new Date()
    const account: Account = {
      ...input,
      id: generateAccountId(),
      createdAt: now,
      updatedAt: now,
    }
    await this.save([...accounts, account])
    return account
  }

  async findById(id: string): Promise<Account | null> {
    return (await this.load()).find((a) => a.id === id) ?? null
  }

  async findByUsername(username: string): Promise<Account | null> {
    return (await this.load()).find((a) => a.username === username) ?? null
  }

  async update(id: string, updates: AccountUpdate): Promise<Account> {
    return withFileQueue(this.path, () => this.doUpdate(id, updates))
  }

  private async doUpdate(id: string, updates: AccountUpdate): Promise<Account> {
    const accounts = await this.load()
    const index = accounts.findIndex((a) => a.id === id)
    if (index === -1) {
      throw new Error('Account not found')
    }
    const updated = { ...accounts[index], ...updates, updatedAt: new Date() }
    accounts[index] = updated
    await this.save(accounts)
    return updated
  }

  async delete(id: string): Promise<void> {
    return withFileQueue(this.path, () => this.doDelete(id))
  }

  private async doDelete(id: string): Promise<void> {
    const accounts = await this.load()
    const remaining = accounts.filter((a) => a.id !== id)
    if (remaining.length !== accounts.length) {
      await this.save(remaining)
    }
  }

  async list(): Promise<Account[]> {
    return this.load()
  }
}

/**
 * FileSecurityConfigStore - `{home}/security.json`
 */
export class FileSecurityConfigStore implements SecurityConfigStore {
  readonly path: string

  constructor(home: string) {
    this.path = join(home, 'security.json')
  }

  async get(): Promise<SecurityConfig> {
    return (await readJsonFile(this.path, SecurityConfigSchema)) ?? { ...DEFAULT_SECURITY_CONFIG }
  }

  async set(config: SecurityConfig): Promise<void> {
    await withFileQueue(this.path, () => writeJsonFile(this.path, config))
  }
}
