import { Command } from 'commander'
import chalk from 'chalk'
import { provisionHandler, statusHandler } from '../handlers/provision-handlers.js'
import {
  ProvisionInputSchema,
  StatusInputSchema,
  provisionInputFrom,
  statusInputFrom,
} from '../types.js'
import type { ProvisionOptions } from '../types.js'
import { parseInputOrExit } from './validation.js'

export function provisionCommand(): Command {
  return new Command('provision')
    .description('Provision the administrator from secret files into a controller home')
    .option('--home <dir>', 'Controller home directory (GANTRY_HOME)')
    .option('--admin-id-file <path>', 'File holding the administrator username')
    .option('--admin-secret-file <path>', 'File holding the administrator password')
    .action(async (options: ProvisionOptions) => {
      const input = parseInputOrExit(ProvisionInputSchema, provisionInputFrom(options))

      const result = await provisionHandler(input)
      if (!result.success) {
        console.error(chalk.red(`[error] Provisioning failed: ${result.error}`))
        process.exit(1)
      }

      const { username, account, removedAccounts, state } = result.data
      console.log(chalk.green(`[ok] Administrator '${username}' ${account}.`))
      for (const removed of removedAccounts) {
        console.log(chalk.yellow(`Removed previously provisioned account '${removed}'.`))
      }
      console.log(`State: ${chalk.cyan(state)}`)
    })
}

export function statusCommand(): Command {
  return new Command('status')
    .description('Show the provisioning state of a controller home')
    .option('--home <dir>', 'Controller home directory (GANTRY_HOME)')
    .action(async (options: { home?: string }) => {
      const input = parseInputOrExit(StatusInputSchema, statusInputFrom(options))

      const result = await statusHandler(input)
      if (!result.success) {
        console.error(chalk.red(`[error] ${result.error}`))
        process.exit(1)
      }

      const { state, accounts } = result.data
      console.log(state === 'READY' ? chalk.green(state) : chalk.yellow(state))
      if (accounts.length === 0) {
        console.log(chalk.yellow('No accounts.'))
      } else {
        console.table(accounts.map((username) => ({ username })))
      }
    })
}
