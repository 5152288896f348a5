import { readFile } from 'node:fs/promises'

export type MissingCredentialReason = 'missing' | 'unreadable' | 'empty'

/**
 * The one failure of credential loading: the secret material is not there.
 *
 * Never recovered from and never replaced by a default. Startup aborts.
 */
export class MissingCredentialError extends Error {
  readonly code = 'MISSING_CREDENTIAL_MATERIAL'

  constructor(
    readonly path: string,
    readonly reason: MissingCredentialReason,
    cause?: unknown
  ) {
    super(MissingCredentialError.describe(path, reason, cause), { cause })
    this.name = 'MissingCredentialError'
  }

  private static describe(path: string, reason: MissingCredentialReason, cause: unknown): string {
    switch (reason) {
      case 'missing':
        return `Credential file ${path} does not exist`
      case 'empty':
        return `Credential file ${path} is empty`
      case 'unreadable':
        return `Credential file ${path} could not be read: ${cause instanceof Error ? cause.message : String(cause)}`
    }
  }
}

/**
 * Read one secret value: the whole file with surrounding whitespace trimmed.
 */
export async function readSecretFile(path: string): Promise<string> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new MissingCredentialError(path, 'missing', err)
    }
    throw new MissingCredentialError(path, 'unreadable', err)
  }

  const value = content.trim()
  if (!value) {
    throw new MissingCredentialError(path, 'empty')
  }
  return value
}

export interface CredentialSecretPaths {
  /** File holding the administrator identifier (username). */
  identifierFile: string
  /** File holding the administrator secret (password). */
  secretFile: string
}

export interface CredentialSecrets {
  identifier: string
  secret: string
}

/**
 * Read both credential files. The identifier is read first; the first
 * failure propagates.
 */
export async function loadCredentialSecrets(paths: CredentialSecretPaths): Promise<CredentialSecrets> {
  const identifier = await readSecretFile(paths.identifierFile)
  const secret = await readSecretFile(paths.secretFile)
  return { identifier, secret }
}
