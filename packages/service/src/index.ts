export { GantryService } from './gantry-service.js'
export { GantryHonoServer, gantryHonoServer } from './gantry-hono-server.js'
export type { GantryHonoServerOptions } from './gantry-hono-server.js'
export {
  InitializerRegistry,
  InitializationError,
  loadInitializersFromDirectory,
} from './initializers.js'
export type { Initializer, ModuleImporter, RunInitializersOptions } from './initializers.js'
export type {
  GantryServiceOptions,
  IGantryService,
  ServiceInfo,
  ServiceState,
  StoppableService,
} from './types.js'
