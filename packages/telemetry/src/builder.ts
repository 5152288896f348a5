/**
 * @gantry/telemetry: TelemetryBuilder
 *
 * Chainable builder producing a `ServiceTelemetry` context bag for
 * dependency injection, plus a synchronous `noop()` factory for unit tests.
 *
 * @example
 * ```ts
 * const telemetry = await new TelemetryBuilder('controller')
 *   .withLogger({ category: ['gantry', 'controller'] })
 *   .withTracing()
 *   .build()
 * ```
 */

import { getLogger } from '@logtape/logtape'
import { trace } from '@opentelemetry/api'
import { ROOT_CATEGORY } from './constants.js'
import { configureLogger } from './logger.js'
import type { LoggerBuilderOpts, ServiceTelemetry, TracingBuilderOpts } from './types.js'

export class TelemetryBuilder {
  private readonly _serviceName: string
  private _loggerOpts: LoggerBuilderOpts | undefined
  private _tracingOpts: TracingBuilderOpts | undefined

  constructor(serviceName: string) {
    if (!serviceName || !serviceName.trim()) {
      throw new Error('serviceName must be a non-empty string')
    }
    this._serviceName = serviceName
  }

  /** Configure the logger signal. Returns `this` for chaining. */
  withLogger(opts?: LoggerBuilderOpts): this {
    this._loggerOpts = opts ?? {}
    return this
  }

  /** Configure the tracing signal. Returns `this` for chaining. */
  withTracing(opts?: TracingBuilderOpts): this {
    this._tracingOpts = opts ?? {}
    return this
  }

  /**
   * Configure the global logger (if not already configured) and return a
   * scoped, frozen `ServiceTelemetry` context.
   */
  async build(): Promise<ServiceTelemetry> {
    if (this._loggerOpts) {
      await configureLogger({ level: this._loggerOpts.level })
    }

    const category = this._loggerOpts?.category ?? [ROOT_CATEGORY, this._serviceName]

    return Object.freeze({
      serviceName: this._serviceName,
      logger: getLogger(category),
      tracer: trace.getTracer(this._serviceName, this._tracingOpts?.version),
    })
  }

  /**
   * Synchronously return a `ServiceTelemetry` without touching global
   * logger configuration. Safe for unit tests.
   */
  static noop(serviceName: string): ServiceTelemetry {
    return Object.freeze({
      serviceName,
      logger: getLogger([ROOT_CATEGORY, serviceName]),
      tracer: trace.getTracer(serviceName),
    })
  }
}
