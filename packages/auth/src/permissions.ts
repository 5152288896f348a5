import type { AuthorizationKind, SecurityConfig } from './models/security.js'

/**
 * Explicit enumerated set of controller permissions.
 */
export enum Permission {
  Administer = 'overall:administer',
  Read = 'overall:read',
  JobBuild = 'job:build',
  JobConfigure = 'job:configure',
  AgentConnect = 'agent:connect',
}

export const ALL_PERMISSIONS: readonly Permission[] = Object.freeze(Object.values(Permission))

/**
 * Who is making a request.
 */
export type Principal = { kind: 'anonymous' } | { kind: 'user'; username: string }

export const ANONYMOUS: Principal = Object.freeze({ kind: 'anonymous' })

export function userPrincipal(username: string): Principal {
  return { kind: 'user', username }
}

export function principalName(principal: Principal): string {
  return principal.kind === 'user' ? principal.username : 'anonymous'
}

export interface AuthorizationStrategy {
  readonly kind: AuthorizationKind
  permissionsFor(principal: Principal): Permission[]
  hasPermission(principal: Principal, permission: Permission): boolean
}

/**
 * Everyone, including anonymous, can do anything. The state of a controller
 * nobody has secured yet.
 */
export class UnsecuredAuthorizationStrategy implements AuthorizationStrategy {
  readonly kind = 'unsecured'

  permissionsFor(_principal: Principal): Permission[] {
    return [...ALL_PERMISSIONS]
  }

  hasPermission(_principal: Principal, _permission: Permission): boolean {
    return true
  }
}

/**
 * Any authenticated principal has full control. Anonymous gets read access
 * when `allowAnonymousRead` is set, nothing otherwise.
 */
export class FullControlOnceLoggedInStrategy implements AuthorizationStrategy {
  readonly kind = 'full-control-once-logged-in'

  constructor(private readonly allowAnonymousRead: boolean) {}

  permissionsFor(principal: Principal): Permission[] {
    if (principal.kind === 'user') {
      return [...ALL_PERMISSIONS]
    }
    return this.allowAnonymousRead ? [Permission.Read] : []
  }

  hasPermission(principal: Principal, permission: Permission): boolean {
    return this.permissionsFor(principal).includes(permission)
  }
}

export function createAuthorizationStrategy(security: SecurityConfig): AuthorizationStrategy {
  switch (security.authorization) {
    case 'unsecured':
      return new UnsecuredAuthorizationStrategy()
    case 'full-control-once-logged-in':
      return new FullControlOnceLoggedInStrategy(security.allowAnonymousRead)
  }
}
