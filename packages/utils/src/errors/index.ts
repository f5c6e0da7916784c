/**
 * Error Handling System
 *
 * Centralized error handling with structured errors and classification
 */

export * from './base'
export * from './classification'
export * from './types'
