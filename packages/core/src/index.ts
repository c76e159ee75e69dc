/**
 * @zenv/core - Configuration model, hostname matching and validation.
 */

export * from './atomic.js'
export * from './config/index.js'
export * from './debug.js'
export * from './dependencies.js'
export * from './errors.js'
export * from './hostname/index.js'
export * from './locks.js'
export * from './schemas/index.js'
export * from './types/index.js'
export * from './validate.js'
