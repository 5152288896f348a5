import { z } from 'zod'

export const AuthorizationKindSchema = z.enum(['unsecured', 'full-control-once-logged-in'])

export type AuthorizationKind = z.infer<typeof AuthorizationKindSchema>

/**
 * SecurityConfig model - process-wide security settings of the controller.
 */
export const SecurityConfigSchema = z.object({
  authorization: AuthorizationKindSchema,
  /** Only meaningful for `full-control-once-logged-in`. */
  allowAnonymousRead: z.boolean(),
  /** Restricts what build agents may ask the controller to do. */
  agentToControllerAccessControl: z.boolean(),
  /** Once true the interactive setup wizard is never offered again. */
  setupComplete: z.boolean(),
  updatedAt: z.coerce.date().optional(),
})

export type SecurityConfig = z.infer<typeof SecurityConfigSchema>

/**
 * Settings of a controller nobody has configured yet.
 */
export const DEFAULT_SECURITY_CONFIG: SecurityConfig = Object.freeze({
  authorization: 'unsecured',
  allowAnonymousRead: true,
  agentToControllerAccessControl: true,
  setupComplete: false,
})
