/**
 * JSON Schema validation for zenv.json and registry.json
 */

import { createRequire } from 'node:module'
import AjvModule, { type ErrorObject } from 'ajv'
import addFormatsModule from 'ajv-formats'

import type { ZenvConfigFile } from '../types/config.js'
import type { RegistryFile } from '../types/registry.js'

const require = createRequire(import.meta.url)
const zenvSchema = require('./zenv.schema.json')
const registrySchema = require('./registry.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

// Both packages are CommonJS; under NodeNext the class sits on `default`.
const Ajv = AjvModule.default
const addFormats = addFormatsModule.default

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

addFormats(ajv)

const validateZenvSchema = ajv.compile<ZenvConfigFile>(zenvSchema)
const validateRegistrySchema = ajv.compile<RegistryFile>(registrySchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'additionalProperties') {
    return `unknown property "${String(err.params['additionalProperty'])}"`
  }

  if (err.keyword === 'propertyNames' || (err.keyword === 'pattern' && err.propertyName)) {
    return `invalid name "${String(err.propertyName ?? err.params['propertyName'])}"`
  }

  if (err.keyword === 'oneOf' && err.instancePath.endsWith('/target_machines')) {
    return 'must be a pattern string or a list of pattern strings'
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a parsed zenv.json document
 */
export function validateZenvConfigFile(data: unknown): ValidationResult<ZenvConfigFile> {
  if (validateZenvSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateZenvSchema.errors) }
}

/**
 * Validate a parsed registry.json document
 */
export function validateRegistryFile(data: unknown): ValidationResult<RegistryFile> {
  if (validateRegistrySchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateRegistrySchema.errors) }
}
