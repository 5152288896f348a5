import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  AccountRealm,
  BOOTSTRAP_INITIALIZER_NAME,
  BootstrapProvisioner,
  DEFAULT_SECURITY_CONFIG,
  FileAccountStore,
  FileSecurityConfigStore,
  InMemoryAccountStore,
  InMemorySecurityConfigStore,
  MissingCredentialError,
  PROVISIONED_SECURITY,
  createBootstrapInitializer,
  getProvisioningState,
  verifyPassword,
} from '../src/index.js'
import type { ProvisioningContext } from '../src/index.js'

describe('BootstrapProvisioner', () => {
  let dir: string
  let identifierFile: string
  let secretFile: string
  let context: { accounts: InMemoryAccountStore; security: InMemorySecurityConfigStore }

  async function writeSecrets(identifier: string, secret: string): Promise<void> {
    await writeFile(identifierFile, identifier)
    await writeFile(secretFile, secret)
  }

  function provisioner(ctx: ProvisioningContext = context): BootstrapProvisioner {
    return new BootstrapProvisioner(ctx, { identifierFile, secretFile })
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-bootstrap-'))
    identifierFile = join(dir, 'admin-id')
    secretFile = join(dir, 'admin-secret')
    context = {
      accounts: new InMemoryAccountStore(),
      security: new InMemorySecurityConfigStore(),
    }
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('provisions exactly one administrator and secures the controller', async () => {
    await writeSecrets('admin', 'test-secret')

    const result = await provisioner().provision()

    expect(result).toEqual({
      username: 'admin',
      account: 'created',
      securityChanged: true,
      removedAccounts: [],
    })
    const accounts = await context.accounts.list()
    expect(accounts).toHaveLength(1)
    expect(accounts[0].username).toBe('admin')
    expect(accounts[0].source).toBe('secret-file')

    const security = await context.security.get()
    expect(security).toMatchObject(PROVISIONED_SECURITY)
    expect(security.updatedAt).toBeInstanceOf(Date)
    expect(await getProvisioningState(context)).toBe('READY')
  })

  it('lets the administrator log in with the file contents', async () => {
    await writeSecrets('admin', 'test-secret')
    await provisioner().provision()

    const realm = new AccountRealm(context.accounts)
    expect((await realm.authenticate('admin', 'test-secret')).success).toBe(true)
    expect((await realm.authenticate('admin', 'wrong')).success).toBe(false)
  })

  it('trims surrounding whitespace from both files', async () => {
    await writeSecrets('  admin\n', 'test-secret\r\n')

    await provisioner().provision()

    const account = await context.accounts.findByUsername('admin')
    expect(account).not.toBeNull()
    if (account) {
      expect(await verifyPassword(account.passwordHash, 'test-secret')).toBe(true)
    }
  })

  it('writes nothing when re-run with the same files', async () => {
    await writeSecrets('admin', 'test-secret')
    await provisioner().provision()

    const create = vi.spyOn(context.accounts, 'create')
    const update = vi.spyOn(context.accounts, 'update')
    const remove = vi.spyOn(context.accounts, 'delete')
    const setSecurity = vi.spyOn(context.security, 'set')

    const result = await provisioner().provision()

    expect(result).toEqual({
      username: 'admin',
      account: 'unchanged',
      securityChanged: false,
      removedAccounts: [],
    })
    expect(create).not.toHaveBeenCalled()
    expect(update).not.toHaveBeenCalled()
    expect(remove).not.toHaveBeenCalled()
    expect(setSecurity).not.toHaveBeenCalled()
  })

  it('resets the password when the secret file changes', async () => {
    await writeSecrets('admin', 'test-secret')
    await provisioner().provision()
    await writeFile(secretFile, 'rotated-secret')

    const result = await provisioner().provision()

    expect(result.account).toBe('updated')
    const realm = new AccountRealm(context.accounts)
    expect((await realm.authenticate('admin', 'rotated-secret')).success).toBe(true)
    expect((await realm.authenticate('admin', 'test-secret')).success).toBe(false)
  })

  it('removes the previous administrator when the identifier changes', async () => {
    await writeSecrets('admin', 'test-secret')
    await provisioner().provision()
    await writeFile(identifierFile, 'operator')

    const result = await provisioner().provision()

    expect(result.account).toBe('created')
    expect(result.removedAccounts).toEqual(['admin'])
    expect((await context.accounts.list()).map((a) => a.username)).toEqual(['operator'])
  })

  it('leaves locally created accounts alone', async () => {
    await context.accounts.create({ username: 'dev', passwordHash: 'h', source: 'local' })
    await writeSecrets('admin', 'test-secret')

    const result = await provisioner().provision()

    expect(result.removedAccounts).toEqual([])
    expect((await context.accounts.list()).map((a) => a.username).sort()).toEqual(['admin', 'dev'])
  })

  it('fails on a missing identifier file and leaves the controller uninitialized', async () => {
    await writeFile(secretFile, 'test-secret')

    const error = await provisioner()
      .provision()
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(MissingCredentialError)
    expect(error).toMatchObject({ path: identifierFile, reason: 'missing' })
    expect(await context.accounts.list()).toEqual([])
    expect(await context.security.get()).toEqual(DEFAULT_SECURITY_CONFIG)
    expect(await getProvisioningState(context)).toBe('UNINITIALIZED')
  })

  it('fails on an empty secret file without creating an account', async () => {
    await writeSecrets('admin', '   \n')

    await expect(provisioner().provision()).rejects.toThrow(
      `Credential file ${secretFile} is empty`
    )
    expect(await context.accounts.list()).toEqual([])
  })

  it('survives a restart with file-backed stores', async () => {
    const home = join(dir, 'home')
    const fileContext = () => ({
      accounts: new FileAccountStore(home),
      security: new FileSecurityConfigStore(home),
    })
    await writeSecrets('admin', 'test-secret')

    await provisioner(fileContext()).provision()
    const second = await provisioner(fileContext()).provision()

    expect(second.account).toBe('unchanged')
    expect(second.securityChanged).toBe(false)
    expect(await getProvisioningState(fileContext())).toBe('READY')
  })

  describe('getProvisioningState', () => {
    it('is UNINITIALIZED for a fresh controller', async () => {
      expect(await getProvisioningState(context)).toBe('UNINITIALIZED')
    })

    it('is UNINITIALIZED when setup completed without a provisioned account', async () => {
      await context.security.set({ ...PROVISIONED_SECURITY })
      expect(await getProvisioningState(context)).toBe('UNINITIALIZED')
    })
  })

  describe('createBootstrapInitializer', () => {
    it('is named to run first and provisions on run', async () => {
      await writeSecrets('admin', 'test-secret')
      const initializer = createBootstrapInitializer({ identifierFile, secretFile })

      expect(initializer.name).toBe(BOOTSTRAP_INITIALIZER_NAME)
      expect(initializer.name).toBe('00-bootstrap-admin')

      await initializer.run(context)

      expect(await getProvisioningState(context)).toBe('READY')
    })
  })
})
