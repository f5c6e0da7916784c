/**
 * Error Type Definitions
 *
 * Defines error categories and codes for structured error handling
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  VALIDATION = 'validation',
  CHAIN = 'chain',
  QUERY = 'query',
  SYSTEM = 'system',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Codec errors
  MALFORMED_BLOCK = 'MALFORMED_BLOCK',
  INVALID_MERKLE_ROOT = 'INVALID_MERKLE_ROOT',

  // Ingestion errors
  UNKNOWN_PARENT = 'UNKNOWN_PARENT',
  DUPLICATE_BLOCK = 'DUPLICATE_BLOCK',

  // Query errors
  BLOCK_NOT_FOUND = 'BLOCK_NOT_FOUND',
  TX_NOT_FOUND = 'TX_NOT_FOUND',
  CHAIN_EMPTY = 'CHAIN_EMPTY',

  // Request / system errors
  NOT_FOUND = 'NOT_FOUND',
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error context for debugging
 */
export interface ErrorContext {
  component?: string
  operation?: string
  blockHash?: string
  txHash?: string
  [key: string]: unknown
}
