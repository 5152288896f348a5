export { configureLogger, resetLogger, getLogger, formatJsonRecord, formatMessage } from './logger.js'
export type { LoggerConfig, LogLevel } from './logger.js'
export { sanitizeProperties, REDACTED } from './sanitizers.js'
export {
  ROOT_CATEGORY,
  VALID_LOG_LEVELS,
  VALID_ENVIRONMENTS,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
export type { Environment } from './constants.js'
export { TelemetryBuilder } from './builder.js'
export type { ServiceTelemetry, LoggerBuilderOpts, TracingBuilderOpts } from './types.js'
