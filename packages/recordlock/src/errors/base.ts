/**
 * recordlock Error Hierarchy
 *
 * Conflicts between transactions are returned as result values. The
 * classes here cover the rest: API misuse, invalid configuration and
 * storage failures. All of them extend RecordLockError which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - Serialization for logs and APIs
 * - Recovery hints
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Transaction ID if within a transaction */
  transactionId?: string;
  /** Record key involved */
  key?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  /** Error class name */
  name: string;
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Timestamp when error occurred */
  timestamp: number;
  /** Error context */
  context?: ErrorContext;
  /** Stack trace (optional) */
  stack?: string;
  /** Serialized cause error */
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  level: 'error' | 'warn';
  timestamp: string;
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** Input or API usage errors */
  VALIDATION = 'VALIDATION',
  /** Timeouts */
  TIMEOUT = 'TIMEOUT',
  /** Storage resource errors (closed, unreadable) */
  RESOURCE = 'RESOURCE',
  /** Internal errors (bugs, unexpected states) */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all recordlock errors
 *
 * @example
 * ```typescript
 * try {
 *   manager.commit(tx);
 * } catch (error) {
 *   if (error instanceof RecordLockError) {
 *     logger.error(error.message, error, error.toLogEntry().metadata);
 *   }
 * }
 * ```
 */
export abstract class RecordLockError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Error context */
  context?: ErrorContext;

  /** Recovery hint for developers */
  recoveryHint?: string;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Check if this error is retryable
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Serialize error for logs and API responses
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof RecordLockError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        recoveryHint: this.recoveryHint,
        ...this.context,
      },
    };
  }

  /**
   * Add context to the error
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
