/**
 * Concrete recordlock errors
 *
 * @packageDocumentation
 */

import { RecordLockError, ErrorCategory, type ErrorContext } from './base.js';

// =============================================================================
// Transaction Errors
// =============================================================================

/**
 * Transaction error codes
 */
export enum TransactionErrorCode {
  /**
   * The transaction already committed or rolled back.
   *
   * @recovery
   * - Begin a new transaction; contexts are single-use
   */
  INVALID_STATE = 'TXN_INVALID_STATE',

  /**
   * The transaction was rolled back because it outlived its timeout.
   *
   * @recovery
   * - Raise `transactionTimeoutMs` or shorten the unit of work
   */
  TIMEOUT = 'TXN_TIMEOUT',

  /**
   * The store failed while applying the write set. Nothing was applied
   * and all locks were released.
   *
   * @recovery
   * - Inspect the cause; retry once the store is healthy
   */
  COMMIT_FAILED = 'TXN_COMMIT_FAILED',
}

/**
 * Error class for transaction misuse and commit failures
 */
export class TransactionError extends RecordLockError {
  readonly code: TransactionErrorCode;
  readonly category: ErrorCategory;
  readonly txnId?: string;

  constructor(
    code: TransactionErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      context?: ErrorContext;
      txnId?: string;
    }
  ) {
    super(message, { cause: options?.cause, context: options?.context });
    this.name = 'TransactionError';
    this.code = code;
    this.txnId = options?.txnId;

    switch (code) {
      case TransactionErrorCode.TIMEOUT:
        this.category = ErrorCategory.TIMEOUT;
        this.recoveryHint = 'Increase transactionTimeoutMs or break the work into smaller transactions';
        break;
      case TransactionErrorCode.COMMIT_FAILED:
        this.category = ErrorCategory.INTERNAL;
        this.recoveryHint = 'Check the store; the write set was not applied';
        break;
      default:
        this.category = ErrorCategory.VALIDATION;
        this.recoveryHint = 'Begin a new transaction; a finished context cannot be reused';
    }

    if (this.txnId) {
      this.context = { ...this.context, transactionId: this.txnId };
    }
  }

  isRetryable(): boolean {
    return this.code === TransactionErrorCode.TIMEOUT || this.code === TransactionErrorCode.COMMIT_FAILED;
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/**
 * Record store error codes
 */
export enum StoreErrorCode {
  /** Table name is not a plain SQL identifier */
  INVALID_TABLE = 'STORE_INVALID_TABLE',
  /** Stored payload failed to decode or validate */
  PAYLOAD_INVALID = 'STORE_PAYLOAD_INVALID',
  /** Store was closed */
  CLOSED = 'STORE_CLOSED',
  /** Underlying database failed */
  IO = 'STORE_IO',
}

/**
 * Error class for record store failures
 */
export class StoreError extends RecordLockError {
  readonly code: StoreErrorCode;
  readonly category: ErrorCategory;

  constructor(
    code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown; context?: ErrorContext }
  ) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
    this.category =
      code === StoreErrorCode.IO || code === StoreErrorCode.CLOSED
        ? ErrorCategory.RESOURCE
        : ErrorCategory.VALIDATION;
  }

  isRetryable(): boolean {
    return this.code === StoreErrorCode.IO;
  }
}

// =============================================================================
// Config Errors
// =============================================================================

/**
 * Error raised when configuration fails validation
 */
export class ConfigError extends RecordLockError {
  readonly code = 'CONFIG_INVALID';
  readonly category = ErrorCategory.VALIDATION;

  /** One line per failed field, `path: message` */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid recordlock configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    this.recoveryHint = 'Fix the listed fields; all durations are non-negative integers in milliseconds';
  }
}
