export { deriveClusterName } from './cluster.js'
export {
  globMatch,
  hasWildcard,
  isUniversalPattern,
  matchesAnyPattern,
  matchesPattern,
  normalizeHostname,
} from './match.js'
export {
  getHostname,
  HOSTNAME_ENV_VARS,
  type HostnameCommand,
  type HostnameSourceOptions,
} from './source.js'
