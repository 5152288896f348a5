import { Command } from 'commander'
import chalk from 'chalk'
import { checkPluginsHandler } from '../handlers/plugins-handlers.js'
import { CheckPluginsInputSchema } from '../types.js'
import { parseInputOrExit } from './validation.js'

export function pluginsCommands(): Command {
  const plugins = new Command('plugins').description('Plugin manifest tools')

  plugins
    .command('check')
    .description('Validate a plugin manifest')
    .argument('<file>', 'Manifest file (one "name" or "name:version" per line)')
    .action(async (file: string) => {
      const input = parseInputOrExit(CheckPluginsInputSchema, { file })

      const result = await checkPluginsHandler(input)
      if (!result.success) {
        console.error(chalk.red(`[error] ${input.file}: ${result.error}`))
        process.exit(1)
      }

      console.log(chalk.green(`[ok] ${result.data.plugins.length} plugins`))
      console.table(
        result.data.plugins.map((p) => ({ name: p.name, version: p.version ?? 'latest' }))
      )
    })

  return plugins
}
