/**
 * Transaction module
 *
 * @packageDocumentation
 */

export {
  TransactionState,
  type EndReason,
  type TransactionOptions,
  type ReadEntry,
  type ReadResult,
  type CommitSuccess,
  type CommitResult,
  type RollbackResult,
  type TransactionContext,
} from './types.js';
export {
  createTransactionContext,
  type ContextDependencies,
  type ManagedTransactionContext,
} from './context.js';
export {
  createTransactionManager,
  type TransactionManager,
  type TransactionManagerOptions,
  type TransactionManagerStats,
  type OpenedTransaction,
} from './manager.js';
