// Account model
export {
  AccountSchema,
  AccountSourceSchema,
  generateAccountId,
  toAccountSummary,
} from './account.js'
export type {
  Account,
  AccountSource,
  AccountSummary,
  AccountUpdate,
  CreateAccountInput,
} from './account.js'

// SecurityConfig model
export {
  AuthorizationKindSchema,
  SecurityConfigSchema,
  DEFAULT_SECURITY_CONFIG,
} from './security.js'
export type { AuthorizationKind, SecurityConfig } from './security.js'
