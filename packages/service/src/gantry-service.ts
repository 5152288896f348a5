import type { GantryConfig } from '@gantry/config'
import type { ServiceTelemetry } from '@gantry/telemetry'
import { TelemetryBuilder } from '@gantry/telemetry'
import type { Hono } from 'hono'
import type { GantryServiceOptions, IGantryService, ServiceInfo, ServiceState } from './types.js'

/**
 * Abstract base class for Gantry services.
 *
 * Provides:
 * - Config injection via `GantryConfig`
 * - Telemetry setup (or pre-built injection)
 * - Lifecycle management: create → initialize → ready → shutdown
 *
 * Subclasses define `info` and `handler`, override `onInitialize()` to build
 * domain objects and register routes, and optionally `onShutdown()`.
 *
 * A failure in `onInitialize()` leaves the service `stopped`: there is no
 * partially-initialized state to serve from.
 *
 * @example
 * ```ts
 * const controller = await ControllerService.create({ config })
 * gantryHonoServer(controller.handler, { services: [controller] }).start()
 * ```
 */
export abstract class GantryService implements IGantryService {
  readonly config: GantryConfig
  private _telemetry: ServiceTelemetry | undefined
  private _state: ServiceState = 'created'
  private readonly _prebuiltTelemetry: ServiceTelemetry | undefined

  abstract readonly info: ServiceInfo

  /** Hono route group with all service routes. Populated during onInitialize(). */
  abstract readonly handler: Hono

  protected constructor(options: GantryServiceOptions) {
    this.config = options.config
    this._prebuiltTelemetry = options.telemetry
  }

  /** Telemetry context. Throws if accessed before initialize(). */
  get telemetry(): ServiceTelemetry {
    if (!this._telemetry) {
      throw new Error(
        `Service "${this.info.name}" not initialized. Call initialize() or use static create().`
      )
    }
    return this._telemetry
  }

  get state(): ServiceState {
    return this._state
  }

  /**
   * 1. Builds telemetry (or uses pre-built)
   * 2. Calls onInitialize() for app-specific async setup
   * 3. Sets state to 'ready'
   */
  async initialize(): Promise<void> {
    if (this._state !== 'created') {
      throw new Error(
        `Cannot initialize service "${this.info.name}" in state "${this._state}". Expected "created".`
      )
    }
    this._state = 'initializing'

    try {
      this._telemetry =
        this._prebuiltTelemetry ??
        (await new TelemetryBuilder(this.info.name)
          .withLogger()
          .withTracing({ version: this.info.version })
          .build())

      await this.onInitialize()

      this._state = 'ready'
      this.telemetry.logger.info`${this.info.name} v${this.info.version} initialized`
    } catch (err) {
      this._state = 'stopped'
      throw err
    }
  }

  async shutdown(): Promise<void> {
    if (this._state !== 'ready') return
    this._state = 'shutting_down'

    try {
      this.telemetry.logger.info`${this.info.name} shutting down`
      await this.onShutdown()
    } finally {
      this._state = 'stopped'
    }
  }

  // --- Protected hooks for subclasses ---

  protected async onInitialize(): Promise<void> {
    // Default: no-op
  }

  protected async onShutdown(): Promise<void> {
    // Default: no-op
  }

  // --- Static factory ---

  /**
   * Create and initialize a service in one call.
   */
  static async create<T extends GantryService>(
    this: new (options: GantryServiceOptions) => T,
    options: GantryServiceOptions
  ): Promise<T> {
    const instance = new this(options)
    await instance.initialize()
    return instance
  }
}
