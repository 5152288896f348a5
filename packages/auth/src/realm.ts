import type { Account, AccountSource } from './models/account.js'
import { getDummyHash, hashPassword, verifyPassword } from './password.js'
import type { AccountStore } from './stores/types.js'

export type EnsureAccountOutcome = 'created' | 'updated' | 'unchanged'

export interface EnsureAccountResult {
  account: Account
  outcome: EnsureAccountOutcome
}

export type AuthenticateResult =
  | { success: true; account: Account }
  | { success: false; error: string }

/**
 * AccountRealm - the controller's local username/password security realm
 *
 * - Idempotent account upsert (no write when nothing changed)
 * - Timing-safe authentication (always runs Argon2, even for unknown usernames)
 * - Updates lastLoginAt on successful interactive login
 */
export class AccountRealm {
  constructor(private readonly store: AccountStore) {}

  /**
   * Make sure `username` exists with `password`.
   *
   * The stored hash is only replaced when the password no longer verifies, so
   * repeated calls with the same input do not touch the store.
   */
  async ensureAccount(
    username: string,
    password: string,
    source: AccountSource
  ): Promise<EnsureAccountResult> {
    const existing = await this.store.findByUsername(username)

    if (!existing) {
      const account = await this.store.create({
        username,
        passwordHash: await hashPassword(password),
        source,
      })
      return { account, outcome: 'created' }
    }

    const passwordMatches = await verifyPassword(existing.passwordHash, password)
    if (passwordMatches && existing.source === source) {
      return { account: existing, outcome: 'unchanged' }
    }

    const account = await this.store.update(existing.id, {
      source,
      ...(passwordMatches ? {} : { passwordHash: await hashPassword(password) }),
    })
    return { account, outcome: 'updated' }
  }

  /**
   * Check a username/password pair. `recordLogin: false` skips the
   * lastLoginAt write, for per-request API authentication.
   */
  async authenticate(
    username: string,
    password: string,
    options: { recordLogin?: boolean } = {}
  ): Promise<AuthenticateResult> {
    const account = await this.store.findByUsername(username)

    const hashToVerify = account?.passwordHash ?? (await getDummyHash())
    const valid = await verifyPassword(hashToVerify, password)

    if (!account || !valid) {
      return { success: false, error: 'Invalid credentials' }
    }

    if (options.recordLogin === false) {
      return { success: true, account }
    }

    const updated = await this.store.update(account.id, { lastLoginAt: new Date() })
    return { success: true, account: updated }
  }
}
