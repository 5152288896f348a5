import type { GantryConfig } from '@gantry/config'
import type { ServiceTelemetry } from '@gantry/telemetry'
import type { Hono } from 'hono'

/** Lifecycle state for a GantryService. */
export type ServiceState = 'created' | 'initializing' | 'ready' | 'shutting_down' | 'stopped'

/** Options accepted by the GantryService constructor. */
export interface GantryServiceOptions {
  /** Pre-loaded GantryConfig. */
  readonly config: GantryConfig
  /**
   * Pre-built telemetry. If provided, the base class skips TelemetryBuilder.build().
   * Useful for testing or when composing services that share one telemetry instance.
   */
  readonly telemetry?: ServiceTelemetry
}

/** Static metadata about a service. */
export interface ServiceInfo {
  readonly name: string
  readonly version: string
}

/** The public contract of a GantryService for composition consumers. */
export interface IGantryService {
  /** Hono route group containing all service routes. */
  readonly handler: Hono
  readonly info: ServiceInfo
  readonly config: GantryConfig
  readonly telemetry: ServiceTelemetry
  readonly state: ServiceState
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

/** What the server wrapper needs from a service: its name and a way to stop it. */
export type StoppableService = Pick<IGantryService, 'info' | 'shutdown'>
