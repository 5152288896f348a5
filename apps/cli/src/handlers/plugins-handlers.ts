import { readPluginManifest } from '@gantry/config'
import type { PluginEntry } from '@gantry/config'
import type { CheckPluginsInput, CliResult } from '../types.js'

export type CheckPluginsResult = CliResult<{ plugins: PluginEntry[] }>

export async function checkPluginsHandler(input: CheckPluginsInput): Promise<CheckPluginsResult> {
  try {
    return { success: true, data: { plugins: await readPluginManifest(input.file) } }
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    }
  }
}
