import { loadDefaultConfig } from '@gantry/config'
import { gantryHonoServer } from '@gantry/service'
import { configureLogger, getLogger } from '@gantry/telemetry'
import { ControllerService } from './service.js'

export { ControllerService } from './service.js'
export type { ControllerServiceOptions } from './service.js'
export type { ControllerContext } from './context.js'
export {
  BASIC_CHALLENGE,
  createAuthMiddleware,
  parseBasicAuth,
  requirePermission,
} from './middleware/auth.js'
export type { ControllerEnv } from './middleware/auth.js'

/**
 * Start the controller. Any initialization failure, missing credential
 * material included, is fatal: the process exits 1 without ever listening.
 */
export async function main(): Promise<void> {
  await configureLogger()
  const logger = getLogger(['gantry', 'controller'])

  try {
    const config = loadDefaultConfig()
    const controller = await ControllerService.create({ config })
    await gantryHonoServer(controller.handler, {
      services: [controller],
      port: config.port,
      hostname: config.hostname,
    }).start()
  } catch (err) {
    logger.fatal`Controller startup aborted: ${err instanceof Error ? err.message : String(err)}`
    process.exit(1)
  }
}

