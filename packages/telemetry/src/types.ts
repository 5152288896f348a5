/**
 * @gantry/telemetry: Shared type definitions
 */

import type { Logger } from '@logtape/logtape'
import type { Tracer } from '@opentelemetry/api'
import type { LogLevel } from './constants.js'

/**
 * Immutable telemetry context bag injected into service constructors.
 *
 * Produced by `TelemetryBuilder.build()` or `TelemetryBuilder.noop()`.
 */
export interface ServiceTelemetry {
  /** Service name used for scoping logger categories and tracer names. */
  readonly serviceName: string
  /** Scoped LogTape logger. Uses tagged template literal API. */
  readonly logger: Logger
  /** OpenTelemetry tracer. A no-op unless an SDK has registered a provider. */
  readonly tracer: Tracer
}

/** Options for `.withLogger()`. */
export interface LoggerBuilderOpts {
  /** Log level threshold. Defaults to LOG_LEVEL env var or 'info'. */
  level?: LogLevel
  /** Logger category hierarchy. Defaults to ['gantry', serviceName]. */
  category?: string[]
}

/** Options for `.withTracing()`. */
export interface TracingBuilderOpts {
  /** Tracer version reported with every span. */
  version?: string
}
