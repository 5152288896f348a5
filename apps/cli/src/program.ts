import { Command } from 'commander'
import { pluginsCommands } from './commands/plugins.js'
import { provisionCommand, statusCommand } from './commands/provision.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('gantry')
    .description('Gantry controller CLI')
    .version(process.env.VERSION || '0.0.0-dev')

  program.addCommand(provisionCommand())
  program.addCommand(statusCommand())
  program.addCommand(pluginsCommands())

  return program
}
