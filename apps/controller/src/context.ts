import type { Logger } from '@logtape/logtape'
import type { ProvisioningContext } from '@gantry/auth'
import type { GantryConfig } from '@gantry/config'

/**
 * What every startup initializer receives: the controller's stores, its
 * configuration and a logger.
 */
export interface ControllerContext extends ProvisioningContext {
  readonly config: GantryConfig
  readonly logger: Logger
}
