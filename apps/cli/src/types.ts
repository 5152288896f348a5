import { DEFAULT_ADMIN_ID_FILE, DEFAULT_ADMIN_SECRET_FILE, DEFAULT_HOME } from '@gantry/config'
import { z } from 'zod'

export type CliResult<T> = { success: true; data: T } | { success: false; error: string }

export const HomeInputSchema = z.object({
  home: z
    .string()
    .min(1)
    .default(DEFAULT_HOME),
})
export type HomeInput = z.infer<typeof HomeInputSchema>

export const ProvisionInputSchema = HomeInputSchema.extend({
  identifierFile: z
    .string()
    .min(1)
    .default(DEFAULT_ADMIN_ID_FILE),
  secretFile: z
    .string()
    .min(1)
    .default(DEFAULT_ADMIN_SECRET_FILE),
})
export type ProvisionInput = z.infer<typeof ProvisionInputSchema>

export const StatusInputSchema = HomeInputSchema
export type StatusInput = z.infer<typeof StatusInputSchema>

type Env = Record<string, string | undefined>

export interface ProvisionOptions {
  home?: string
  adminIdFile?: string
  adminSecretFile?: string
}

/**
 * Raw provision input: command-line options first, then the controller's
 * environment variables, then the schema defaults.
 */
export function provisionInputFrom(options: ProvisionOptions, env: Env = process.env) {
  return {
    home: options.home || env.GANTRY_HOME || undefined,
    identifierFile: options.adminIdFile || env.GANTRY_ADMIN_ID_FILE || undefined,
    secretFile: options.adminSecretFile || env.GANTRY_ADMIN_SECRET_FILE || undefined,
  }
}

export function statusInputFrom(options: { home?: string }, env: Env = process.env) {
  return { home: options.home || env.GANTRY_HOME || undefined }
}

export const CheckPluginsInputSchema = z.object({
  file: z.string().min(1),
})
export type CheckPluginsInput = z.infer<typeof CheckPluginsInputSchema>
