import { readFile } from 'node:fs/promises'
import { z } from 'zod'

const PLUGIN_NAME = /^[A-Za-z0-9_.-]+$/

/**
 * One entry of a plugin manifest: `name` or `name:version`.
 */
export const PluginEntrySchema = z.object({
  name: z.string().regex(PLUGIN_NAME),
  version: z.string().regex(PLUGIN_NAME).optional(),
})

export type PluginEntry = z.infer<typeof PluginEntrySchema>

export class PluginManifestError extends Error {
  constructor(
    message: string,
    readonly line: number
  ) {
    super(`line ${line}: ${message}`)
    this.name = 'PluginManifestError'
  }
}

/**
 * Parse a newline-delimited plugin manifest.
 *
 * Blank lines and `#` comments (whole-line or trailing) are ignored.
 * Duplicate plugin names are rejected.
 */
export function parsePluginManifest(text: string): PluginEntry[] {
  const entries: PluginEntry[] = []
  const seen = new Set<string>()

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1
    const content = raw.split('#')[0].trim()
    if (!content) return

    const [name, version, ...rest] = content.split(':').map((part) => part.trim())
    if (rest.length > 0) {
      throw new PluginManifestError(`expected "name" or "name:version", got "${content}"`, line)
    }

    const parsed = PluginEntrySchema.safeParse(version === undefined ? { name } : { name, version })
    if (!parsed.success) {
      throw new PluginManifestError(`invalid plugin entry "${content}"`, line)
    }
    if (seen.has(parsed.data.name)) {
      throw new PluginManifestError(`duplicate plugin "${parsed.data.name}"`, line)
    }

    seen.add(parsed.data.name)
    entries.push(parsed.data)
  })

  return entries
}

export async function readPluginManifest(path: string): Promise<PluginEntry[]> {
  return parsePluginManifest(await readFile(path, 'utf-8'))
}
