import {
  BootstrapProvisioner,
  FileAccountStore,
  FileSecurityConfigStore,
  getProvisioningState,
} from '@gantry/auth'
import type { ProvisionResult, ProvisioningContext, ProvisioningState } from '@gantry/auth'
import type { CliResult, ProvisionInput, StatusInput } from '../types.js'

export type ProvisionHandlerResult = CliResult<ProvisionResult & { state: ProvisioningState }>

export type StatusHandlerResult = CliResult<{ state: ProvisioningState; accounts: string[] }>

function fileStores(home: string): ProvisioningContext {
  return {
    accounts: new FileAccountStore(home),
    security: new FileSecurityConfigStore(home),
  }
}

/**
 * Run the bootstrap provisioner against the file stores of a controller home,
 * without starting a controller.
 */
export async function provisionHandler(input: ProvisionInput): Promise<ProvisionHandlerResult> {
  try {
    const stores = fileStores(input.home)
    const result = await new BootstrapProvisioner(stores, {
      identifierFile: input.identifierFile,
      secretFile: input.secretFile,
    }).provision()
    return { success: true, data: { ...result, state: await getProvisioningState(stores) } }
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    }
  }
}

/**
 * Report the provisioning state of a controller home and its account names.
 */
export async function statusHandler(input: StatusInput): Promise<StatusHandlerResult> {
  try {
    const stores = fileStores(input.home)
    const accounts = await stores.accounts.list()
    return {
      success: true,
      data: {
        state: await getProvisioningState(stores),
        accounts: accounts.map((a) => a.username).sort(),
      },
    }
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    }
  }
}
