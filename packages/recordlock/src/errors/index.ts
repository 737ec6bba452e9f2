/**
 * recordlock Error Module
 *
 * @packageDocumentation
 */

export {
  RecordLockError,
  ErrorCategory,
  toError,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './base.js';

export {
  TransactionError,
  TransactionErrorCode,
  StoreError,
  StoreErrorCode,
  ConfigError,
} from './errors.js';
