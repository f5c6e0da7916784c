/**
 * Utilities for manipulating bytes, hex strings and hashes
 */
export * from './bytes'
/**
 * Errors
 */
export * from './errors/index'
export * from './hash'
export * from './helpers'
export * from './lock'
/**
 * winston logger factory
 */
export * from './logging'
export * from './safe'
