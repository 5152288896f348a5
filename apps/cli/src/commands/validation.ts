import chalk from 'chalk'
import type { z } from 'zod'

/**
 * Print zod issues and exit 1 on invalid command input.
 */
export function parseInputOrExit<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const validation = schema.safeParse(input)
  if (!validation.success) {
    console.error(chalk.red('Invalid input:'))
    validation.error.issues.forEach((issue) => {
      console.error(chalk.yellow(`- ${issue.path.join('.')}: ${issue.message}`))
    })
    process.exit(1)
  }
  return validation.data
}
