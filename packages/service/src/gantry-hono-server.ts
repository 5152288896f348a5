import { createAdaptorServer } from '@hono/node-server'
import type { ServerType } from '@hono/node-server'
import { getLogger } from '@gantry/telemetry'
import { Hono } from 'hono'
import type { Server as HttpServer } from 'node:http'

import type { StoppableService } from './types.js'

export interface GantryHonoServerOptions {
  /** Port to listen on. Defaults to 8080. Pass 0 for an ephemeral port. */
  port?: number
  /** Hostname to bind to. Defaults to '0.0.0.0'. */
  hostname?: string
  /** Services whose shutdown() will be called on stop. */
  services?: StoppableService[]
  /** Wire SIGTERM/SIGINT to stop(). Defaults to true. */
  handleSignals?: boolean
}

function isHttpServer(server: ServerType): server is HttpServer {
  return 'closeAllConnections' in server
}

/**
 * Hono server wrapper with standard lifecycle management.
 *
 * Wraps a service's `.handler` route group with:
 * - Standard `/health` endpoint
 * - `@hono/node-server` binding
 * - Graceful shutdown on SIGTERM/SIGINT
 *
 * The server only starts listening once every service it is given has
 * finished initializing, so no request can arrive before initialization.
 *
 * @example
 * ```ts
 * const controller = await ControllerService.create({ config })
 * await gantryHonoServer(controller.handler, {
 *   services: [controller],
 *   port: config.port,
 * }).start()
 * ```
 */
export class GantryHonoServer {
  private readonly _handler: Hono
  private readonly _options: GantryHonoServerOptions
  private _server: HttpServer | undefined
  private _shutdownHandlers: (() => Promise<void>)[] = []
  private readonly _logger = getLogger(['gantry', 'hono-server'])

  constructor(handler: Hono, options?: GantryHonoServerOptions) {
    this._handler = handler
    this._options = options ?? {}
  }

  /** Start listening. Resolves once the server is bound. */
  async start(): Promise<this> {
    if (this._server) {
      throw new Error('Server is already running. Call stop() before starting again.')
    }

    const port = this._options.port ?? 8080
    const hostname = this._options.hostname ?? '0.0.0.0'

    const app = new Hono()

    const serviceNames = this._options.services?.map((s) => s.info.name) ?? []
    app.get('/health', (c) =>
      c.json({
        status: 'ok',
        services: serviceNames,
      })
    )

    app.route('/', this._handler)

    const server = createAdaptorServer({
      fetch: app.fetch,
      hostname,
    })
    if (!isHttpServer(server)) {
      throw new Error('Expected an HTTP/1.1 server from @hono/node-server')
    }
    this._server = server

    // Wait for the server to actually bind (required for port: 0)
    await new Promise<void>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          this._logger.error`Port ${port} is already in use`
        }
        this._server = undefined
        reject(err)
      }
      server.once('error', onError)
      server.listen(port, hostname, () => {
        server.off('error', onError)
        resolve()
      })
    })

    if (this._options.handleSignals ?? true) {
      const shutdownHandler = async () => {
        await this.stop()
        process.exit(0)
      }
      this._shutdownHandlers.push(shutdownHandler)
      process.on('SIGTERM', shutdownHandler)
      process.on('SIGINT', shutdownHandler)
    }

    const names = serviceNames.length > 0 ? ` [${serviceNames.join(', ')}]` : ''
    this._logger.info`Gantry server${names} listening on ${hostname}:${this.port}`

    return this
  }

  /** The port the server is listening on. Only valid after start(). */
  get port(): number {
    if (!this._server) throw new Error('Server is not running')
    const addr = this._server.address()
    if (typeof addr === 'string' || !addr) throw new Error('Cannot determine port')
    return addr.port
  }

  /** Gracefully stop: close the server, then shut down services. */
  async stop(): Promise<void> {
    if (this._server) {
      const server = this._server
      this._server = undefined
      server.closeAllConnections()
      await new Promise<void>((resolve) => {
        server.close(() => resolve())
      })
    }

    if (this._options.services) {
      await Promise.allSettled(this._options.services.map((s) => s.shutdown()))
    }

    for (const handler of this._shutdownHandlers) {
      process.removeListener('SIGTERM', handler)
      process.removeListener('SIGINT', handler)
    }
    this._shutdownHandlers = []
  }
}

/**
 * Convenience factory for creating a GantryHonoServer.
 */
export function gantryHonoServer(
  handler: Hono,
  options?: GantryHonoServerOptions
): GantryHonoServer {
  return new GantryHonoServer(handler, options)
}
