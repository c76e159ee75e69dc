export { listEnvironmentNames, mergeEnvironment, toPatternList, type MergeOptions } from './merge.js'
export {
  CONFIG_FILENAME,
  createInitialConfig,
  DEFAULT_BASE_DIR,
  parseZenvJson,
  readZenvJson,
  serializeZenvJson,
  type InitConfigOptions,
} from './zenv-json.js'
