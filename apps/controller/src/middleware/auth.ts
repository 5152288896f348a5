import type { Logger } from '@logtape/logtape'
import {
  ANONYMOUS,
  createAuthorizationStrategy,
  userPrincipal,
} from '@gantry/auth'
import type {
  AccountRealm,
  AuthorizationStrategy,
  Permission,
  Principal,
  SecurityConfigStore,
} from '@gantry/auth'
import { createMiddleware } from 'hono/factory'

export interface ControllerEnv {
  Variables: {
    principal: Principal
    strategy: AuthorizationStrategy
  }
}

export const BASIC_CHALLENGE = 'Basic realm="gantry"'

export interface BasicCredentials {
  username: string
  password: string
}

/**
 * Decode an `Authorization: Basic ...` header. Returns null for any other
 * scheme or a malformed value. The password may itself contain colons.
 */
export function parseBasicAuth(header: string): BasicCredentials | null {
  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(header.trim())
  if (!match) return null

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8')
  const separator = decoded.indexOf(':')
  if (separator < 1) return null

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  }
}

export interface AuthMiddlewareOptions {
  realm: AccountRealm
  security: SecurityConfigStore
  logger: Logger
}

/**
 * Resolve the request principal and the active authorization strategy.
 *
 * - No Authorization header: anonymous, passes through
 * - Valid Basic credentials: the account's user principal
 * - Anything else: 401 with a Basic challenge
 *
 * The strategy is rebuilt from the stored security config on every request,
 * so a provisioning change applies without a restart.
 */
export function createAuthMiddleware({ realm, security, logger }: AuthMiddlewareOptions) {
  return createMiddleware<ControllerEnv>(async (c, next) => {
    c.set('strategy', createAuthorizationStrategy(await security.get()))

    const header = c.req.header('Authorization')
    if (!header) {
      c.set('principal', ANONYMOUS)
      return next()
    }

    const credentials = parseBasicAuth(header)
    if (!credentials) {
      c.header('WWW-Authenticate', BASIC_CHALLENGE)
      return c.json({ error: 'Invalid authorization header format' }, 401)
    }

    const result = await realm.authenticate(credentials.username, credentials.password, {
      recordLogin: false,
    })
    if (!result.success) {
      logger.warn`Rejected API credentials for ${credentials.username}`
      c.header('WWW-Authenticate', BASIC_CHALLENGE)
      return c.json({ error: result.error }, 401)
    }

    c.set('principal', userPrincipal(result.account.username))
    return next()
  })
}

/**
 * Gate a route on one permission. Anonymous callers are asked to
 * authenticate (401); authenticated callers are refused (403).
 */
export function requirePermission(permission: Permission) {
  return createMiddleware<ControllerEnv>(async (c, next) => {
    const principal = c.get('principal')
    if (c.get('strategy').hasPermission(principal, permission)) {
      return next()
    }

    if (principal.kind === 'anonymous') {
      c.header('WWW-Authenticate', BASIC_CHALLENGE)
      return c.json({ error: 'Authentication required' }, 401)
    }
    return c.json({ error: `${principal.username} is missing the ${permission} permission` }, 403)
  })
}
