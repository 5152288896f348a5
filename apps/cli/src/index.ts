import { configureLogger } from '@gantry/telemetry'
import { createProgram } from './program.js'

await configureLogger()
await createProgram().parseAsync(process.argv)
