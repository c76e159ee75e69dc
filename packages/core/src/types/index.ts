export * from './config.js'
export * from './registry.js'
