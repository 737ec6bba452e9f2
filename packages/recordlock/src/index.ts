/**
 * recordlock
 *
 * Optimistic and pessimistic concurrency control for versioned records.
 * Conflicts come back as tagged result values; exceptions are reserved
 * for misuse and infrastructure failures.
 *
 * @example
 * ```typescript
 * import { MemoryRecordStore, createTransactionManager } from 'recordlock';
 *
 * const store = new MemoryRecordStore<{ balance: number }>([['acct:1', { balance: 100 }]]);
 * const manager = createTransactionManager({ store });
 *
 * const tx = manager.begin();
 * const account = await tx.read('acct:1');
 * if (account.kind === 'found') {
 *   tx.write('acct:1', { balance: account.payload.balance + 50 });
 * }
 * const result = manager.commit(tx);
 * // { kind: 'success', versions: Map { 'acct:1' => 2 } } or a VersionMismatch
 * ```
 *
 * @packageDocumentation
 */

// Result values and ids
export {
  createTransactionId,
  generateTransactionId,
  isValidTransactionId,
  isSuccess,
  isConflict,
  isLockFailure,
  describeResult,
  type TransactionId,
  type LockMode,
  type ReadMode,
  type Success,
  type VersionMismatch,
  type LockTimeout,
  type LockHeldByOther,
  type Cancelled,
  type Deadlock,
  type NotFound,
  type LockFailure,
  type ConflictResult,
  type ResultValue,
} from '@recordlock/shared-types';

export * from './store/index.js';
export * from './guard/index.js';
export * from './locks/index.js';
export * from './transaction/index.js';
export * from './policy/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export {
  createLogger,
  getLogLevelFromEnv,
  withTraceContext,
  LoggerAsyncStorage,
  ConsoleSink,
  JsonSink,
  NoOpSink,
  MemorySink,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
  type StructuredLogger,
} from './logging/index.js';
export { sleep } from './utils/sleep.js';
