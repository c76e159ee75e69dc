/**
 * Registry types.
 *
 * RegistryEntry is the in-memory form; RegistryFileEntry mirrors
 * registry.json, including fields older files used.
 */

export interface RegistryEntry {
  /** Lowercase hex, unique within the registry */
  id: string
  name: string
  /** Absolute project directory holding zenv.json */
  projectDir: string
  /** Absolute path of the virtual environment */
  venvPath: string
  /** Comma-joined target patterns, "any" when unrestricted */
  targetMachines: string
  description?: string | undefined
  /** ISO-8601 registration time */
  registeredAt?: string | undefined
}

export interface RegistryFileEntry {
  id?: string
  name: string
  project_dir: string
  venv_path?: string
  target_machines?: string
  /** Older spelling of target_machines */
  target_machine?: string
  description?: string | null
  registered_at?: string
}

export interface RegistryFile {
  version?: number
  environments: RegistryFileEntry[]
}

export const REGISTRY_FORMAT_VERSION = 1
