/**
 * Error Classification Utilities
 */

import { BlockQueryError } from './base'
import {
  ErrorCategory,
  ErrorCode,
  type ErrorContext,
  ErrorSeverity,
} from './types'

const NOT_FOUND_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.BLOCK_NOT_FOUND,
  ErrorCode.TX_NOT_FOUND,
  ErrorCode.CHAIN_EMPTY,
])

/**
 * Classify an unknown error into a BlockQueryError
 */
export function classifyError(
  error: unknown,
  context?: ErrorContext,
): BlockQueryError {
  if (error instanceof BlockQueryError) {
    if (!context) return error
    return new BlockQueryError(error.message, {
      code: error.code,
      category: error.category,
      severity: error.severity,
      context: { ...error.context, ...context },
      cause: error.cause,
    })
  }

  const message =
    error instanceof Error ? error.message || 'Unknown error' : String(error)

  return new BlockQueryError(message, {
    code: ErrorCode.INTERNAL_ERROR,
    category: ErrorCategory.SYSTEM,
    severity: ErrorSeverity.HIGH,
    context,
    cause: error,
  })
}

export function isBlockQueryError(error: unknown): error is BlockQueryError {
  return error instanceof BlockQueryError
}

/**
 * Query-level failures that surface to callers as "not found"
 */
export function isNotFoundError(error: unknown): error is BlockQueryError {
  return error instanceof BlockQueryError && NOT_FOUND_CODES.has(error.code)
}

export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return error instanceof BlockQueryError && error.code === code
}
