/**
 * Base Error Classes
 *
 * Structured errors with a stable code and category, one class per failure
 * the codec, the chain index and the query layer can report.
 */

import { ErrorCategory, ErrorCode, type ErrorContext, ErrorSeverity } from './types'

type ErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * Base error class for all blockquery errors
 */
export class BlockQueryError extends Error {
  public readonly code: ErrorCode
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly context?: ErrorContext
  public readonly timestamp: number

  constructor(
    message: string,
    options: {
      code: ErrorCode
      category: ErrorCategory
      severity?: ErrorSeverity
      context?: ErrorContext
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.category = options.category
    this.severity = options.severity ?? ErrorSeverity.MEDIUM
    this.context = options.context
    this.timestamp = Date.now()

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
    }
  }
}

/**
 * Raw bytes could not be decoded into a block or transaction
 */
export class MalformedBlockError extends BlockQueryError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.MALFORMED_BLOCK,
      category: ErrorCategory.VALIDATION,
    })
  }
}

export class InvalidMerkleRootError extends BlockQueryError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.INVALID_MERKLE_ROOT,
      category: ErrorCategory.VALIDATION,
    })
  }
}

/**
 * The block's parent is neither the zero hash nor an indexed block
 */
export class UnknownParentError extends BlockQueryError {
  constructor(
    public readonly blockHash: string,
    public readonly parentHash: string,
  ) {
    super(`Unknown parent ${parentHash} for block ${blockHash}`, {
      code: ErrorCode.UNKNOWN_PARENT,
      category: ErrorCategory.CHAIN,
      severity: ErrorSeverity.LOW,
      context: { blockHash, parentHash },
    })
  }
}

export class DuplicateBlockError extends BlockQueryError {
  constructor(public readonly blockHash: string) {
    super(`Block ${blockHash} is already indexed`, {
      code: ErrorCode.DUPLICATE_BLOCK,
      category: ErrorCategory.CHAIN,
      severity: ErrorSeverity.LOW,
      context: { blockHash },
    })
  }
}

export class BlockNotFoundError extends BlockQueryError {
  constructor(blockHash: string) {
    super(`Block ${blockHash} not found`, {
      code: ErrorCode.BLOCK_NOT_FOUND,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      context: { blockHash },
    })
  }
}

export class TxNotFoundError extends BlockQueryError {
  constructor(txHash: string) {
    super(`Transaction ${txHash} not found`, {
      code: ErrorCode.TX_NOT_FOUND,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
      context: { txHash },
    })
  }
}

export class ChainEmptyError extends BlockQueryError {
  constructor() {
    super('No blocks have been ingested', {
      code: ErrorCode.CHAIN_EMPTY,
      category: ErrorCategory.QUERY,
      severity: ErrorSeverity.LOW,
    })
  }
}

/**
 * Request-level validation failures (bad hash, unexpected parameter)
 */
export class InvalidInputError extends BlockQueryError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.INVALID_INPUT,
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
    })
  }
}

export class ConfigurationError extends BlockQueryError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      code: ErrorCode.CONFIGURATION_ERROR,
      category: ErrorCategory.SYSTEM,
      severity: ErrorSeverity.CRITICAL,
    })
  }
}
