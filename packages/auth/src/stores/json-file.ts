import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { randomUUID } from 'node:crypto'
import { dirname } from 'node:path'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Read and validate a JSON document. Returns null when the file does not exist;
 * a file that exists but fails to parse or validate is an error.
 */
export async function readJsonFile<T>(
  path: string,
  schema: { parse(data: unknown): T }
): Promise<T | null> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    if (isNotFound(err)) return null
    throw err
  }
  return schema.parse(JSON.parse(raw))
}

/**
 * Write a JSON document atomically: a temp file beside the target, then rename.
 * A crash mid-write leaves the previous document intact.
 */
export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true, mode: 0o700 })
  const tmp = `${path}.${randomUUID()}.tmp`
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', { mode: 0o600 })
  await rename(tmp, path)
}

const pending = new Map<string, Promise<void>>()

/**
 * Run `op` once every earlier operation on the same path has settled, so
 * read-modify-write cycles on one document never interleave within a process.
 * The result (or error) of `op` is returned to the caller only.
 */
export function withFileQueue<T>(path: string, op: () => Promise<T>): Promise<T> {
  const result = (pending.get(path) ?? Promise.resolve()).then(op)
  const tail = result.then(
    () => undefined,
    () => undefined
  )
  pending.set(path, tail)
  void tail.then(() => {
    if (pending.get(path) === tail) pending.delete(path)
  })
  return result
}
