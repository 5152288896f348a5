import { randomUUID } from 'node:crypto'
import { z } from 'zod'

/**
 * Where an account came from. `secret-file` accounts are owned by the
 * bootstrap provisioner and re-asserted on every start.
 */
export const AccountSourceSchema = z.enum(['secret-file', 'local'])

export type AccountSource = z.infer<typeof AccountSourceSchema>

/**
 * Account model - a user of the controller's local security realm.
 *
 * Dates are coerced so records survive a JSON round trip through the file store.
 */
export const AccountSchema = z.object({
  id: z.string().startsWith('acct_'),
  username: z.string().min(1),
  passwordHash: z.string().min(1),
  source: AccountSourceSchema,
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  lastLoginAt: z.coerce.date().optional(),
})

export type Account = z.infer<typeof AccountSchema>

/**
 * Input for creating a new account (id and timestamps generated)
 */
export type CreateAccountInput = Pick<Account, 'username' | 'passwordHash' | 'source'>

/**
 * Fields an update may change
 */
export type AccountUpdate = Partial<Pick<Account, 'passwordHash' | 'source' | 'lastLoginAt'>>

export function generateAccountId(): string {
  return `acct_${randomUUID().replace(/-/g, '').slice(0, 12)}`
}

/**
 * Account as exposed outside the realm: never carries the password hash.
 */
export type AccountSummary = Omit<Account, 'passwordHash'>

export function toAccountSummary(account: Account): AccountSummary {
  const { passwordHash: _passwordHash, ...summary } = account
  return summary
}
