/**
 * @zenv/store - Environment registry storage and identifier resolution.
 */

export {
  DEFAULT_ZENV_HOME,
  getZenvHome,
  PathResolver,
  REGISTRY_FILENAME,
  REGISTRY_LOCK_FILENAME,
  type PathOptions,
} from './paths.js'
export {
  ANY_TARGET,
  computeVenvPath,
  generateEnvironmentId,
  joinTargetMachines,
  loadRegistry,
  Registry,
  splitTargetMachines,
  withRegistryLock,
  type IdSeed,
  type RegisterOptions,
  type RegisterResult,
} from './registry.js'
export {
  CURRENT_DIRECTORY_IDENTIFIER,
  MIN_PARTIAL_ID_LENGTH,
  resolveIdentifier,
  type ResolveOptions,
} from './resolve.js'
