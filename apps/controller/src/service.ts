import {
  AccountRealm,
  FileAccountStore,
  FileSecurityConfigStore,
  InMemoryAccountStore,
  InMemorySecurityConfigStore,
  Permission,
  createAuthorizationStrategy,
  createBootstrapInitializer,
  getProvisioningState,
  principalName,
  toAccountSummary,
  userPrincipal,
} from '@gantry/auth'
import type { ProvisioningContext } from '@gantry/auth'
import { readPluginManifest } from '@gantry/config'
import type { PluginEntry } from '@gantry/config'
import {
  GantryService,
  InitializerRegistry,
  loadInitializersFromDirectory,
} from '@gantry/service'
import type { GantryServiceOptions, Initializer } from '@gantry/service'
import { Hono } from 'hono'
import { z } from 'zod'
import type { ControllerContext } from './context.js'
import { createAuthMiddleware, requirePermission } from './middleware/auth.js'
import type { ControllerEnv } from './middleware/auth.js'

const LoginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
})

export interface ControllerServiceOptions extends GantryServiceOptions {
  /** Extra initializers, run alongside the built-in and directory ones. */
  readonly initializers?: Initializer<ControllerContext>[]
}

/**
 * The Gantry controller.
 *
 * Initialization runs every startup initializer (the bootstrap provisioner
 * first) before any route exists, so a failure there leaves nothing to serve.
 */
export class ControllerService extends GantryService {
  readonly info = { name: 'controller', version: '0.1.0' }
  readonly handler = new Hono()

  private readonly _extraInitializers: Initializer<ControllerContext>[]
  private _stores: ProvisioningContext | undefined
  private _plugins: PluginEntry[] = []

  constructor(options: ControllerServiceOptions) {
    super(options)
    this._extraInitializers = options.initializers ?? []
  }

  /** Account and security stores. Throws before initialize(). */
  get stores(): ProvisioningContext {
    if (!this._stores) {
      throw new Error('Controller stores are not available before initialize()')
    }
    return this._stores
  }

  get plugins(): readonly PluginEntry[] {
    return this._plugins
  }

  protected override async onInitialize(): Promise<void> {
    const logger = this.telemetry.logger
    const stores = this.createStores()

    const registry = new InitializerRegistry<ControllerContext>()
    if (this.config.bootstrap.enabled) {
      registry.register(
        createBootstrapInitializer({
          identifierFile: this.config.bootstrap.identifierFile,
          secretFile: this.config.bootstrap.secretFile,
          logger: logger.getChild('bootstrap'),
        })
      )
    }
    if (this.config.initDir) {
      for (const initializer of await loadInitializersFromDirectory<ControllerContext>(
        this.config.initDir
      )) {
        registry.register(initializer)
      }
    }
    for (const initializer of this._extraInitializers) {
      registry.register(initializer)
    }

    await registry.runAll(
      { ...stores, config: this.config, logger },
      { logger: logger.getChild('init'), tracer: this.telemetry.tracer }
    )
    this._stores = stores

    if (this.config.pluginManifest) {
      this._plugins = await readPluginManifest(this.config.pluginManifest)
      logger.info`Loaded ${this._plugins.length} plugins from ${this.config.pluginManifest}`
    }

    const state = await getProvisioningState(stores)
    logger.info`Controller state ${state}`
    if (await this.isSetupWizardReachable()) {
      logger.warn`Setup wizard is enabled and setup is not complete; API is unavailable until setup`
    }

    this.mountRoutes(stores)
  }

  private createStores(): ProvisioningContext {
    if (this.config.store === 'memory') {
      return {
        accounts: new InMemoryAccountStore(),
        security: new InMemorySecurityConfigStore(),
      }
    }
    return {
      accounts: new FileAccountStore(this.config.home),
      security: new FileSecurityConfigStore(this.config.home),
    }
  }

  /**
   * Reachable only when the wizard is enabled and setup has not completed.
   * Read from the store on every call: once provisioning marks setup
   * complete the wizard stays gone.
   */
  async isSetupWizardReachable(): Promise<boolean> {
    if (!this.config.setupWizard.enabled) return false
    return !(await this.stores.security.get()).setupComplete
  }

  private mountRoutes(stores: ProvisioningContext): void {
    const logger = this.telemetry.logger
    const realm = new AccountRealm(stores.accounts)

    this.handler.use('*', async (c, next) => {
      if (c.req.path !== '/setup' && (await this.isSetupWizardReachable())) {
        return c.json({ error: 'Setup required', setup: '/setup' }, 503)
      }
      return next()
    })

    this.handler.get('/', (c) => c.text('Gantry controller'))

    this.handler.get('/setup', async (c) => {
      if (!(await this.isSetupWizardReachable())) {
        return c.json({ error: 'Not found' }, 404)
      }
      return c.json({ setupRequired: true })
    })

    this.handler.post('/login', async (c) => {
      let body: unknown
      try {
        body = await c.req.json()
      } catch {
        return c.json({ error: 'Request body must be JSON' }, 400)
      }
      const parsed = LoginRequestSchema.safeParse(body)
      if (!parsed.success) {
        return c.json({ error: 'username and password are required' }, 400)
      }

      const { username, password } = parsed.data
      const result = await realm.authenticate(username, password)
      if (!result.success) {
        logger.warn`Failed login for ${username}`
        return c.json({ error: result.error }, 401)
      }

      const strategy = createAuthorizationStrategy(await stores.security.get())
      logger.info`${username} logged in`
      return c.json({
        username: result.account.username,
        permissions: strategy.permissionsFor(userPrincipal(result.account.username)),
      })
    })

    const api = new Hono<ControllerEnv>()
    api.use('*', createAuthMiddleware({ realm, security: stores.security, logger }))

    api.get('/whoami', (c) => {
      const principal = c.get('principal')
      return c.json({
        name: principalName(principal),
        authenticated: principal.kind === 'user',
        permissions: c.get('strategy').permissionsFor(principal),
      })
    })

    api.get('/state', requirePermission(Permission.Administer), async (c) => {
      return c.json({
        state: await getProvisioningState(stores),
        accounts: (await stores.accounts.list()).map(toAccountSummary),
        security: await stores.security.get(),
      })
    })

    api.get('/plugins', requirePermission(Permission.Read), (c) => {
      return c.json({ plugins: this._plugins })
    })

    this.handler.route('/api', api)
  }
}
