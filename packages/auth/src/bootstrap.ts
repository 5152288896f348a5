import type { Logger } from '@logtape/logtape'
import type { Initializer } from '@gantry/service'
import { getAuthLogger } from './logger.js'
import type { SecurityConfig } from './models/security.js'
import { AccountRealm } from './realm.js'
import type { EnsureAccountOutcome } from './realm.js'
import { loadCredentialSecrets } from './secrets.js'
import type { CredentialSecretPaths } from './secrets.js'
import type { AccountStore, SecurityConfigStore } from './stores/types.js'

export const BOOTSTRAP_INITIALIZER_NAME = '00-bootstrap-admin'

export type ProvisioningState = 'UNINITIALIZED' | 'READY'

/**
 * Stores the provisioner works against. The controller's initialization
 * context extends this.
 */
export interface ProvisioningContext {
  accounts: AccountStore
  security: SecurityConfigStore
}

/**
 * Security settings of a provisioned controller.
 */
export const PROVISIONED_SECURITY: Readonly<Omit<SecurityConfig, 'updatedAt'>> = Object.freeze({
  authorization: 'full-control-once-logged-in',
  allowAnonymousRead: false,
  // Disabled so agents can run builds without a manual approval step.
  // This trades the agent/controller trust boundary for unattended setup.
  agentToControllerAccessControl: false,
  setupComplete: true,
})

export interface BootstrapProvisionerOptions extends CredentialSecretPaths {
  logger?: Logger
}

export interface ProvisionResult {
  username: string
  account: EnsureAccountOutcome
  securityChanged: boolean
  /** Usernames of previously provisioned accounts that were removed. */
  removedAccounts: string[]
}

function securityMatches(current: SecurityConfig): boolean {
  return (
    current.authorization === PROVISIONED_SECURITY.authorization &&
    current.allowAnonymousRead === PROVISIONED_SECURITY.allowAnonymousRead &&
    current.agentToControllerAccessControl === PROVISIONED_SECURITY.agentToControllerAccessControl &&
    current.setupComplete === PROVISIONED_SECURITY.setupComplete
  )
}

/**
 * BootstrapProvisioner turns two secret files into a controller with a usable
 * administrator and no interactive setup.
 *
 * Flow:
 * 1. Read identifier and secret files (fails with MissingCredentialError)
 * 2. Upsert the administrator account from them
 * 3. Remove any other account a previous run provisioned
 * 4. Apply the full-control-once-logged-in policy and mark setup complete
 *
 * The security config is written last: a failure in any earlier step leaves
 * the controller UNINITIALIZED. Re-running with the same files writes nothing.
 */
export class BootstrapProvisioner {
  private readonly realm: AccountRealm
  private readonly logger: Logger

  constructor(
    private readonly context: ProvisioningContext,
    private readonly options: BootstrapProvisionerOptions
  ) {
    this.realm = new AccountRealm(context.accounts)
    this.logger = options.logger ?? getAuthLogger('bootstrap')
  }

  async provision(): Promise<ProvisionResult> {
    const { identifier, secret } = await loadCredentialSecrets(this.options)

    const { account, outcome } = await this.realm.ensureAccount(identifier, secret, 'secret-file')
    switch (outcome) {
      case 'created':
        this.logger.info`Administrator account ${identifier} created`
        break
      case 'updated':
        this.logger.warn`Administrator account ${identifier} reset from ${this.options.secretFile}`
        break
      case 'unchanged':
        this.logger.debug`Administrator account ${identifier} already provisioned`
        break
    }

    const removedAccounts: string[] = []
    for (const other of await this.context.accounts.list()) {
      if (other.source === 'secret-file' && other.id !== account.id) {
        await this.context.accounts.delete(other.id)
        removedAccounts.push(other.username)
        this.logger.warn`Removed previously provisioned account ${other.username}`
      }
    }

    const current = await this.context.security.get()
    const securityChanged = !securityMatches(current)
    if (securityChanged) {
      await this.context.security.set({ ...PROVISIONED_SECURITY, updatedAt: new Date() })
      this.logger.info`Authorization set to full control once logged in; setup wizard completed`
      if (current.agentToControllerAccessControl) {
        this.logger.warn`Agent-to-controller access control disabled`
      }
    }

    return { username: identifier, account: outcome, securityChanged, removedAccounts }
  }
}

/**
 * UNINITIALIZED until a provisioned administrator exists, the policy is
 * applied and setup is complete.
 */
export async function getProvisioningState(
  context: ProvisioningContext
): Promise<ProvisioningState> {
  const security = await context.security.get()
  if (security.authorization !== 'full-control-once-logged-in' || !security.setupComplete) {
    return 'UNINITIALIZED'
  }
  const accounts = await context.accounts.list()
  return accounts.some((a) => a.source === 'secret-file') ? 'READY' : 'UNINITIALIZED'
}

/**
 * The provisioner as a startup initializer.
 */
export function createBootstrapInitializer<TContext extends ProvisioningContext>(
  options: BootstrapProvisionerOptions
): Initializer<TContext> {
  return {
    name: BOOTSTRAP_INITIALIZER_NAME,
    async run(context) {
      await new BootstrapProvisioner(context, options).provision()
    },
  }
}
