/**
 * Transaction Manager
 *
 * Owns the version guard and lock table for one record store, hands out
 * transaction contexts and enforces the transaction timeout: a context
 * that outlives it is rolled back and its locks go back to the table.
 *
 * @packageDocumentation
 */

import {
  createTransactionId,
  generateTransactionId,
  type ReadMode,
  type TransactionId,
} from '@recordlock/shared-types';
import { assertTimeoutMs, parseConfig, type RecordLockConfig, type RecordLockConfigInput } from '../config/index.js';
import { TransactionError, TransactionErrorCode } from '../errors/index.js';
import { createVersionGuard, type VersionGuard } from '../guard/version-guard.js';
import { createLockTable, type LockTable } from '../locks/lock-table.js';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import type { RecordStore } from '../store/types.js';
import { createTransactionContext, type ManagedTransactionContext } from './context.js';
import type {
  CommitResult,
  EndReason,
  ReadResult,
  RollbackResult,
  TransactionContext,
  TransactionOptions,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface TransactionManagerOptions<T> {
  store: RecordStore<T>;
  /** Shared lock table (default: a new one built from config) */
  lockTable?: LockTable;
  config?: RecordLockConfigInput;
  logger?: StructuredLogger;
}

export interface TransactionManagerStats {
  started: number;
  committed: number;
  rolledBack: number;
  /** Transactions ended by a version mismatch or a failed lock wait */
  conflicts: number;
  timeouts: number;
}

/**
 * A transaction together with the outcome of its first read
 */
export interface OpenedTransaction<T> {
  context: TransactionContext<T>;
  read: ReadResult<T>;
}

export interface TransactionManager<T> {
  readonly config: RecordLockConfig;
  readonly guard: VersionGuard<T>;
  readonly locks: LockTable;

  /**
   * Start a transaction
   * @throws TransactionError(INVALID_STATE) after close() or for an id already in use
   * @throws RangeError for a timeout a timer cannot honour
   */
  begin(options?: TransactionOptions): TransactionContext<T>;

  /**
   * Start a transaction and read its first record
   *
   * @example
   * ```typescript
   * const { context, read } = await manager.open('acct:1', 'pessimistic');
   * if (read.kind === 'found') {
   *   context.write('acct:1', { balance: read.payload.balance - 10 });
   *   manager.commit(context);
   * }
   * ```
   */
  open(key: string, mode?: ReadMode, options?: TransactionOptions): Promise<OpenedTransaction<T>>;

  commit(context: TransactionContext<T>): CommitResult;
  rollback(context: TransactionContext<T>): RollbackResult;

  activeCount(): number;

  /**
   * Roll back active transactions `isAlive` reports dead, then sweep
   * the lock table for any other abandoned locks
   * @returns ids of the rolled back transactions
   */
  reapAbandoned(isAlive: (txnId: TransactionId) => boolean): TransactionId[];

  stats(): TransactionManagerStats;

  /**
   * Roll back every active transaction and refuse new ones
   */
  close(): void;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a transaction manager over a store
 */
export function createTransactionManager<T>(options: TransactionManagerOptions<T>): TransactionManager<T> {
  const config = parseConfig(options.config ?? {});
  const baseLogger = options.logger ?? createLogger();
  const logger = baseLogger.child({ component: 'transaction-manager' });
  const contextLogger = baseLogger.child({ component: 'transaction' });
  const guard = createVersionGuard(options.store, { logger: baseLogger });
  const locks =
    options.lockTable ??
    createLockTable({
      lockTimeoutMs: config.lockTimeoutMs,
      maxWaitQueueSize: config.maxWaitQueueSize,
      detectDeadlocks: config.detectDeadlocks,
      lockLeaseMs: config.lockLeaseMs,
      logger: baseLogger,
    });

  const active = new Map<TransactionId, ManagedTransactionContext<T>>();
  const counters: TransactionManagerStats = {
    started: 0,
    committed: 0,
    rolledBack: 0,
    conflicts: 0,
    timeouts: 0,
  };
  let closed = false;

  function record(reason: EndReason): void {
    if (reason === 'commit') {
      counters.committed++;
      return;
    }
    counters.rolledBack++;
    if (reason === 'conflict' || reason === 'lock_failure') counters.conflicts++;
    if (reason === 'timeout') counters.timeouts++;
  }

  const manager: TransactionManager<T> = {
    config,
    guard,
    locks,

    begin(txnOptions: TransactionOptions = {}): TransactionContext<T> {
      if (closed) {
        throw new TransactionError(TransactionErrorCode.INVALID_STATE, 'Transaction manager is closed');
      }

      const txnId = txnOptions.txnId === undefined ? generateTransactionId() : createTransactionId(txnOptions.txnId);
      if (active.has(txnId)) {
        throw new TransactionError(TransactionErrorCode.INVALID_STATE, `Transaction ${txnId} is already active`, {
          txnId,
        });
      }

      const timeoutMs = txnOptions.timeoutMs ?? config.transactionTimeoutMs;
      const lockTimeoutMs = txnOptions.lockTimeoutMs ?? config.lockTimeoutMs;
      assertTimeoutMs('transaction timeout', timeoutMs);
      assertTimeoutMs('lock timeout', lockTimeoutMs);
      let timer: ReturnType<typeof setTimeout> | undefined;

      const context = createTransactionContext<T>({
        txnId,
        guard,
        locks,
        lockTimeoutMs,
        logger: contextLogger,
        signal: txnOptions.signal,
        onEnd: (reason) => {
          if (timer !== undefined) clearTimeout(timer);
          active.delete(txnId);
          record(reason);
        },
      });

      active.set(txnId, context);
      counters.started++;

      if (timeoutMs > 0 && timeoutMs !== Infinity) {
        timer = setTimeout(() => {
          const result = context.terminate('timeout');
          if (result.kind === 'rolled_back') {
            logger.warn('Transaction {txnId} timed out after {timeoutMs}ms', {
              txnId,
              timeoutMs,
              released: result.released,
            });
          }
        }, timeoutMs);
        timer.unref();
      }

      logger.debug('Transaction {txnId} started', { txnId, timeoutMs });
      return context;
    },

    async open(key: string, mode: ReadMode = 'optimistic', txnOptions?: TransactionOptions): Promise<OpenedTransaction<T>> {
      const context = manager.begin(txnOptions);
      const read = await context.read(key, mode);
      return { context, read };
    },

    commit(context: TransactionContext<T>): CommitResult {
      return context.commit();
    },

    rollback(context: TransactionContext<T>): RollbackResult {
      return context.rollback();
    },

    activeCount(): number {
      return active.size;
    },

    reapAbandoned(isAlive: (txnId: TransactionId) => boolean): TransactionId[] {
      const reaped: TransactionId[] = [];
      for (const [txnId, context] of [...active]) {
        if (!isAlive(txnId)) {
          context.terminate('evicted');
          reaped.push(txnId);
        }
      }
      const swept = locks.sweep(isAlive);
      if (reaped.length > 0 || swept.evictedHolders.length > 0) {
        logger.warn('Reaped abandoned transactions', { reaped, evictedHolders: swept.evictedHolders });
      }
      return reaped;
    },

    stats(): TransactionManagerStats {
      return { ...counters };
    },

    close(): void {
      if (closed) return;
      closed = true;
      for (const context of [...active.values()]) {
        context.terminate('closed');
      }
      logger.info('Transaction manager closed', { stats: { ...counters } });
    },
  };

  return manager;
}
