import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import type { Logger } from '@logtape/logtape'
import { SpanStatusCode } from '@opentelemetry/api'
import type { Tracer } from '@opentelemetry/api'

/**
 * A named startup step. Every registered initializer runs once, in order,
 * before the server accepts traffic.
 */
export interface Initializer<TContext> {
  readonly name: string
  run(context: TContext): Promise<void>
}

/**
 * Raised when an initializer fails. Startup must abort on this error.
 */
export class InitializationError extends Error {
  constructor(
    readonly initializer: string,
    cause: unknown
  ) {
    super(
      `Initializer "${initializer}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'InitializationError'
  }
}

export interface RunInitializersOptions {
  logger: Logger
  tracer: Tracer
}

/**
 * Ordered list of startup initializers.
 *
 * Order is lexicographic by name, the same order a scan of an
 * initialization directory yields, so `00-bootstrap-admin` runs before
 * `10-seed-jobs` no matter which was registered first.
 */
export class InitializerRegistry<TContext> {
  private readonly initializers = new Map<string, Initializer<TContext>>()

  register(initializer: Initializer<TContext>): this {
    if (this.initializers.has(initializer.name)) {
      throw new Error(`Initializer "${initializer.name}" is already registered`)
    }
    this.initializers.set(initializer.name, initializer)
    return this
  }

  list(): Initializer<TContext>[] {
    return Array.from(this.initializers.values()).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    )
  }

  get size(): number {
    return this.initializers.size
  }

  /**
   * Run every initializer sequentially. The first failure stops the run and
   * is rethrown as an `InitializationError`; later initializers never run.
   */
  async runAll(context: TContext, { logger, tracer }: RunInitializersOptions): Promise<void> {
    for (const initializer of this.list()) {
      await tracer.startActiveSpan(`init ${initializer.name}`, async (span) => {
        const startedAt = Date.now()
        try {
          await initializer.run(context)
          logger.info`Initializer ${initializer.name} completed in ${Date.now() - startedAt}ms`
        } catch (err) {
          span.recordException(err instanceof Error ? err : String(err))
          span.setStatus({ code: SpanStatusCode.ERROR })
          logger.error`Initializer ${initializer.name} failed: ${err instanceof Error ? err.message : String(err)}`
          throw new InitializationError(initializer.name, err)
        } finally {
          span.end()
        }
      })
    }
  }
}

const SCRIPT_EXTENSIONS = ['.js', '.mjs']

export type ModuleImporter = (url: string) => Promise<unknown>

function hasDefaultFunction<TContext>(
  mod: unknown
): mod is { default: (context: TContext) => unknown } {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'default' in mod &&
    typeof mod.default === 'function'
  )
}

/**
 * Load every script in an initialization directory as an initializer.
 *
 * Each `*.js` / `*.mjs` file must default-export a function taking the
 * initialization context. The initializer is named after the file. A missing
 * directory yields no initializers.
 */
export async function loadInitializersFromDirectory<TContext>(
  dir: string,
  importModule: ModuleImporter = (url) => import(url)
): Promise<Initializer<TContext>[]> {
  let files: string[]
  try {
    files = await readdir(dir)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return []
    }
    throw err
  }

  const scripts = files.filter((f) => SCRIPT_EXTENSIONS.some((ext) => f.endsWith(ext))).sort()
  const initializers: Initializer<TContext>[] = []

  for (const file of scripts) {
    const mod = await importModule(pathToFileURL(join(dir, file)).href)
    if (!hasDefaultFunction<TContext>(mod)) {
      throw new Error(`Initialization script "${file}" must default-export a function`)
    }
    const script: (context: TContext) => unknown = mod.default
    initializers.push({
      name: file,
      async run(context) {
        await script(context)
      },
    })
  }

  return initializers
}
