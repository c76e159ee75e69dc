/**
 * @zenv/engine - High-level orchestration for zenv.
 *
 * WHY: Commands need the same sequences (select environment, check host,
 * build, register) and the CLI should stay a thin layer over them.
 */

// Environment selection
export {
  detectEnvironment,
  loadProjectConfig,
  prepareEnvironment,
  type PreparedEnvironment,
  type PrepareOptions,
  type ProjectConfig,
} from './environment.js'

// Setup
export {
  setupEnvironment,
  setupFailure,
  shellScriptRunner,
  type ScriptRunner,
  type SetupOptions,
  type SetupResult,
  type SetupStep,
} from './setup.js'

// Registration
export {
  deregisterEnvironment,
  registerEnvironment,
  registerPrepared,
  type DeregisterOptions,
  type RegisterEnvironmentOptions,
  type RegisterEnvironmentResult,
} from './registration.js'

// Using environments
export {
  activateScriptPath,
  getActivationScript,
  listEnvironments,
  readSetupLog,
  runInEnvironment,
  setupLogPath,
  type ListOptions,
} from './activation.js'

// Scripts and processes
export {
  ACTIVATE_SCRIPT_NAME,
  FILTERED_REQUIREMENTS_NAME,
  MODULE_PACKAGES_NAME,
  parseFailureMessage,
  parseModuleFailure,
  renderActivateScript,
  renderRequirements,
  renderSetupScript,
  REQUIREMENTS_NAME,
  SETUP_EXIT_CODES,
  SETUP_LOG_NAME,
  SETUP_SCRIPT_NAME,
  shellQuote,
  type Installer,
  type SetupScriptOptions,
} from './scripts.js'
export { exec, type ExecOptions, type ExecResult } from './exec.js'
