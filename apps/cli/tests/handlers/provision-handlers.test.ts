import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { provisionHandler, statusHandler } from '../../src/handlers/provision-handlers.js'

describe('Provision Handlers', () => {
  let dir: string
  let home: string
  let identifierFile: string
  let secretFile: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-cli-'))
    home = join(dir, 'home')
    identifierFile = join(dir, 'admin-id')
    secretFile = join(dir, 'admin-secret')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('provisionHandler', () => {
    it('provisions a fresh home', async () => {
      await writeFile(identifierFile, 'admin\n')
      await writeFile(secretFile, 'test-secret\n')

      const result = await provisionHandler({ home, identifierFile, secretFile })

      expect(result).toEqual({
        success: true,
        data: {
          username: 'admin',
          account: 'created',
          securityChanged: true,
          removedAccounts: [],
          state: 'READY',
        },
      })
    })

    it('is a no-op the second time', async () => {
      await writeFile(identifierFile, 'admin')
      await writeFile(secretFile, 'test-secret')
      await provisionHandler({ home, identifierFile, secretFile })

      const result = await provisionHandler({ home, identifierFile, secretFile })

      expect(result.success).toBe(true)
      if (result.success) {
        expect(result.data.account).toBe('unchanged')
        expect(result.data.securityChanged).toBe(false)
      }
    })

    it('returns the missing file as an error', async () => {
      await writeFile(secretFile, 'test-secret')

      const result = await provisionHandler({ home, identifierFile, secretFile })

      expect(result).toEqual({
        success: false,
        error: `Credential file ${identifierFile} does not exist`,
      })
    })
  })

  describe('statusHandler', () => {
    it('reports an empty home as UNINITIALIZED', async () => {
      expect(await statusHandler({ home })).toEqual({
        success: true,
        data: { state: 'UNINITIALIZED', accounts: [] },
      })
    })

    it('reports a provisioned home as READY', async () => {
      await writeFile(identifierFile, 'admin')
      await writeFile(secretFile, 'test-secret')
      await provisionHandler({ home, identifierFile, secretFile })

      expect(await statusHandler({ home })).toEqual({
        success: true,
        data: { state: 'READY', accounts: ['admin'] },
      })
    })
  })
})
