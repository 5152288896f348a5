export type { AccountStore, SecurityConfigStore } from './types.js'
export { InMemoryAccountStore, InMemorySecurityConfigStore } from './memory.js'
export { FileAccountStore, FileSecurityConfigStore } from './file.js'
