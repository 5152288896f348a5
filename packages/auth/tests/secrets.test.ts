import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MissingCredentialError, loadCredentialSecrets, readSecretFile } from '../src/secrets.js'

describe('readSecretFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-secrets-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function secret(name: string, content: string): Promise<string> {
    const path = join(dir, name)
    await writeFile(path, content)
    return path
  }

  it('trims a trailing newline', async () => {
    expect(await readSecretFile(await secret('id', 'admin\n'))).toBe('admin')
  })

  it('trims surrounding whitespace but keeps inner spaces', async () => {
    expect(await readSecretFile(await secret('pw', '  correct horse \t\r\n'))).toBe('correct horse')
  })

  it('fails with reason "missing" when the file does not exist', async () => {
    const path = join(dir, 'absent')
    const failure = readSecretFile(path)

    await expect(failure).rejects.toBeInstanceOf(MissingCredentialError)
    await expect(failure).rejects.toMatchObject({
      reason: 'missing',
      path,
      code: 'MISSING_CREDENTIAL_MATERIAL',
      message: `Credential file ${path} does not exist`,
    })
  })

  it('fails with reason "empty" for a blank file', async () => {
    const path = await secret('blank', ' \n\n')
    await expect(readSecretFile(path)).rejects.toMatchObject({
      reason: 'empty',
      message: `Credential file ${path} is empty`,
    })
  })

  it('fails with reason "unreadable" when the path is a directory', async () => {
    await expect(readSecretFile(dir)).rejects.toMatchObject({ reason: 'unreadable', path: dir })
  })
})

describe('loadCredentialSecrets', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-secrets-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads both values', async () => {
    await writeFile(join(dir, 'id'), 'admin\n')
    await writeFile(join(dir, 'secret'), 'test-secret\n')

    expect(
      await loadCredentialSecrets({
        identifierFile: join(dir, 'id'),
        secretFile: join(dir, 'secret'),
      })
    ).toEqual({ identifier: 'admin', secret: 'test-secret' })
  })

  it('fails when only the identifier exists', async () => {
    await writeFile(join(dir, 'id'), 'admin')

    await expect(
      loadCredentialSecrets({ identifierFile: join(dir, 'id'), secretFile: join(dir, 'secret') })
    ).rejects.toMatchObject({ reason: 'missing', path: join(dir, 'secret') })
  })

  it('fails when only the secret exists', async () => {
    await writeFile(join(dir, 'secret'), 'test-secret')

    await expect(
      loadCredentialSecrets({ identifierFile: join(dir, 'id'), secretFile: join(dir, 'secret') })
    ).rejects.toMatchObject({ reason: 'missing', path: join(dir, 'id') })
  })
})
