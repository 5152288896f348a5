export * from './models/index.js'
export * from './stores/index.js'
export { hashPassword, verifyPassword, getDummyHash } from './password.js'
export { AccountRealm } from './realm.js'
export type { AuthenticateResult, EnsureAccountOutcome, EnsureAccountResult } from './realm.js'
export {
  ALL_PERMISSIONS,
  ANONYMOUS,
  FullControlOnceLoggedInStrategy,
  Permission,
  UnsecuredAuthorizationStrategy,
  createAuthorizationStrategy,
  principalName,
  userPrincipal,
} from './permissions.js'
export type { AuthorizationStrategy, Principal } from './permissions.js'
export { MissingCredentialError, loadCredentialSecrets, readSecretFile } from './secrets.js'
export type {
  CredentialSecretPaths,
  CredentialSecrets,
  MissingCredentialReason,
} from './secrets.js'
export {
  BOOTSTRAP_INITIALIZER_NAME,
  BootstrapProvisioner,
  PROVISIONED_SECURITY,
  createBootstrapInitializer,
  getProvisioningState,
} from './bootstrap.js'
export type {
  BootstrapProvisionerOptions,
  ProvisionResult,
  ProvisioningContext,
  ProvisioningState,
} from './bootstrap.js'
export { getAuthLogger } from './logger.js'
