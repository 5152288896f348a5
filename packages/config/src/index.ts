import { z } from 'zod'

export {
  PluginManifestError,
  PluginEntrySchema,
  parsePluginManifest,
  readPluginManifest,
} from './plugin-manifest.js'
export type { PluginEntry } from './plugin-manifest.js'

const PortNumberSchema = z.number().int().min(0).max(65535)

/**
 * Default container secret mounts for the administrator credentials.
 */
export const DEFAULT_ADMIN_ID_FILE = '/run/secrets/gantry-admin-id'
export const DEFAULT_ADMIN_SECRET_FILE = '/run/secrets/gantry-admin-secret'

export const DEFAULT_HOME = '/var/gantry_home'

/**
 * Bootstrap (first-start provisioning) configuration.
 *
 * Only the *paths* of the credential files are configuration. The values
 * themselves are read by the provisioner at startup and never stored here.
 */
export const BootstrapConfigSchema = z.object({
  enabled: z.boolean().default(true),
  identifierFile: z.string().min(1).default(DEFAULT_ADMIN_ID_FILE),
  secretFile: z.string().min(1).default(DEFAULT_ADMIN_SECRET_FILE),
})

export type BootstrapConfig = z.infer<typeof BootstrapConfigSchema>

export const SetupWizardConfigSchema = z.object({
  enabled: z.boolean().default(true),
})

export type SetupWizardConfig = z.infer<typeof SetupWizardConfigSchema>

/**
 * Top-level Gantry controller configuration
 */
export const GantryConfigSchema = z.object({
  port: PortNumberSchema.default(8080),
  hostname: z.string().default('0.0.0.0'),
  // Agent port is exposed by the container, not served by the controller.
  agentPort: PortNumberSchema.default(50000),
  home: z.string().min(1).default(DEFAULT_HOME),
  store: z.enum(['file', 'memory']).default('file'),
  setupWizard: SetupWizardConfigSchema.default({}),
  bootstrap: BootstrapConfigSchema.default({}),
  initDir: z.string().min(1).optional(),
  pluginManifest: z.string().min(1).optional(),
})

export type GantryConfig = z.infer<typeof GantryConfigSchema>
export type GantryConfigInput = z.input<typeof GantryConfigSchema>

type Env = Record<string, string | undefined>

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined
  return Number(value)
}

/**
 * Flags are on unless explicitly set to "false" (or "0").
 */
function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  const normalized = value.trim().toLowerCase()
  return !(normalized === 'false' || normalized === '0')
}

/**
 * Loads the controller configuration from environment variables.
 *
 * @throws ZodError when a value fails validation (e.g. a non-numeric port)
 */
export function loadDefaultConfig(env: Env = process.env): GantryConfig {
  return GantryConfigSchema.parse({
    port: envNumber(env.PORT),
    hostname: env.GANTRY_HOSTNAME || undefined,
    agentPort: envNumber(env.GANTRY_AGENT_PORT),
    home: env.GANTRY_HOME || undefined,
    store: env.GANTRY_STORE || undefined,
    setupWizard: {
      enabled: envFlag(env.GANTRY_SETUP_WIZARD),
    },
    bootstrap: {
      enabled: envFlag(env.GANTRY_BOOTSTRAP),
      identifierFile: env.GANTRY_ADMIN_ID_FILE || undefined,
      secretFile: env.GANTRY_ADMIN_SECRET_FILE || undefined,
    },
    initDir: env.GANTRY_INIT_DIR || undefined,
    pluginManifest: env.GANTRY_PLUGIN_MANIFEST || undefined,
  })
}
