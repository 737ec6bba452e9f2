/**
 * Transaction Context
 *
 * Buffers a unit of work against a version guard and a lock table.
 * Optimistic reads remember the version they saw; pessimistic reads lock
 * the key first. Commit turns the write buffer into one all-or-nothing
 * batch: compare-and-set for optimistically read keys, unconditional
 * writes for locked ones.
 *
 * @packageDocumentation
 */

import {
  describeResult,
  type LockFailure,
  type NotFound,
  type ReadMode,
  type TransactionId,
  type VersionMismatch,
} from '@recordlock/shared-types';
import { TransactionError, TransactionErrorCode, toError } from '../errors/index.js';
import type { ReadSnapshot, VersionGuard } from '../guard/version-guard.js';
import type { LockTable } from '../locks/lock-table.js';
import type { StructuredLogger } from '../logging/index.js';
import type { BatchResult, BatchWrite } from '../store/types.js';
import {
  TransactionState,
  type CommitResult,
  type EndReason,
  type ReadEntry,
  type ReadResult,
  type RollbackResult,
  type TransactionContext,
} from './types.js';

/**
 * Collaborators of a context, supplied by its manager
 */
export interface ContextDependencies<T> {
  txnId: TransactionId;
  guard: VersionGuard<T>;
  locks: LockTable;
  lockTimeoutMs: number;
  logger: StructuredLogger;
  signal?: AbortSignal;
  /** Called once when the context leaves ACTIVE */
  onEnd?: (reason: EndReason) => void;
}

/**
 * Context plus the hook its manager uses to end it from outside
 */
export interface ManagedTransactionContext<T> extends TransactionContext<T> {
  /**
   * Roll back for a reason other than a caller's rollback()
   */
  terminate(reason: EndReason): RollbackResult;
}

interface ReadRecord<T> {
  mode: ReadMode;
  version: number;
  snapshot: ReadSnapshot<T> | NotFound;
}

export function createTransactionContext<T>(deps: ContextDependencies<T>): ManagedTransactionContext<T> {
  const { txnId, guard, locks, lockTimeoutMs } = deps;
  const logger = deps.logger.child({ txnId });
  const startedAt = Date.now();

  const reads = new Map<string, ReadRecord<T>>();
  const writes = new Map<string, { payload: T }>();
  let state = TransactionState.ACTIVE;
  let endReason: EndReason | null = null;
  let conflict: VersionMismatch | LockFailure | null = null;

  // cancels pending lock waits when the transaction ends or the caller aborts
  const waits = new AbortController();
  const forwardAbort = (): void => waits.abort();
  if (deps.signal?.aborted) {
    waits.abort();
  } else {
    deps.signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  function assertActive(operation: string): void {
    if (state === TransactionState.ACTIVE) return;
    if (endReason === 'timeout') {
      throw new TransactionError(TransactionErrorCode.TIMEOUT, `Transaction ${txnId} timed out`, { txnId });
    }
    throw new TransactionError(
      TransactionErrorCode.INVALID_STATE,
      `Cannot ${operation}: transaction ${txnId} is ${state}`,
      { txnId }
    );
  }

  function finish(next: TransactionState, reason: EndReason): string[] {
    state = next;
    endReason = reason;
    writes.clear();
    deps.signal?.removeEventListener('abort', forwardAbort);
    waits.abort();
    const released = locks.releaseAll(txnId);
    deps.onEnd?.(reason);
    return released;
  }

  function rollbackAfter(reason: EndReason, cause: VersionMismatch | LockFailure): void {
    conflict = cause;
    const released = finish(TransactionState.ROLLED_BACK, reason);
    logger.warn('Transaction {txnId} rolled back: {detail}', { detail: describeResult(cause), reason, released });
  }

  function versionOf(snapshot: ReadSnapshot<T> | NotFound): number {
    return snapshot.kind === 'found' ? snapshot.version : 0;
  }

  /**
   * What this transaction sees for a key it has read
   */
  function view(key: string, record: ReadRecord<T>): ReadSnapshot<T> | NotFound {
    const buffered = writes.get(key);
    if (buffered) {
      return { kind: 'found', key, payload: buffered.payload, version: record.version };
    }
    return record.snapshot;
  }

  const context: ManagedTransactionContext<T> = {
    txnId,
    startedAt,

    get state(): TransactionState {
      return state;
    },

    get endReason(): EndReason | null {
      return endReason;
    },

    get conflict(): VersionMismatch | LockFailure | null {
      return conflict;
    },

    async read(key: string, mode: ReadMode = 'optimistic'): Promise<ReadResult<T>> {
      assertActive('read');
      const existing = reads.get(key);

      if (mode === 'optimistic' || existing?.mode === 'pessimistic') {
        if (existing) {
          return view(key, existing);
        }
        const snapshot = guard.beginRead(key);
        const record: ReadRecord<T> = { mode: 'optimistic', version: versionOf(snapshot), snapshot };
        reads.set(key, record);
        return snapshot;
      }

      const lock = await locks.acquire(key, txnId, { timeoutMs: lockTimeoutMs, signal: waits.signal });
      // ended while waiting: its locks were already released
      assertActive('read');

      if (lock.kind !== 'acquired') {
        rollbackAfter('lock_failure', lock);
        return lock;
      }

      const snapshot = guard.beginRead(key);
      const version = versionOf(snapshot);

      if (existing && existing.version !== version) {
        const mismatch: VersionMismatch = { kind: 'version_mismatch', key, expected: existing.version, actual: version };
        rollbackAfter('conflict', mismatch);
        return mismatch;
      }

      const record: ReadRecord<T> = { mode: 'pessimistic', version, snapshot: existing?.snapshot ?? snapshot };
      reads.set(key, record);
      return view(key, record);
    },

    write(key: string, payload: T): void {
      assertActive('write');
      if (!reads.has(key)) {
        const snapshot = guard.beginRead(key);
        reads.set(key, { mode: 'optimistic', version: versionOf(snapshot), snapshot });
      }
      writes.set(key, { payload });
    },

    commit(): CommitResult {
      assertActive('commit');

      const batch: BatchWrite<T>[] = [];
      for (const [key, { payload }] of writes) {
        const record = reads.get(key);
        if (record?.mode === 'pessimistic') {
          batch.push({ kind: 'force', key, payload });
        } else {
          batch.push({ kind: 'cas', key, expectedVersion: record?.version ?? 0, payload });
        }
      }

      let result: BatchResult;
      try {
        result = batch.length === 0 ? { kind: 'success', versions: new Map() } : guard.tryCommitAll(batch);
      } catch (error) {
        finish(TransactionState.ROLLED_BACK, 'error');
        logger.error('Commit of {txnId} failed', toError(error), { keys: batch.map((w) => w.key) });
        throw new TransactionError(TransactionErrorCode.COMMIT_FAILED, `Commit of ${txnId} failed`, {
          cause: error,
          txnId,
        });
      }

      if (result.kind === 'version_mismatch') {
        rollbackAfter('conflict', result);
        return result;
      }

      finish(TransactionState.COMMITTED, 'commit');
      logger.debug('Transaction {txnId} committed', { keys: [...result.versions.keys()] });
      return { kind: 'success', txnId, versions: result.versions };
    },

    rollback(): RollbackResult {
      if (state !== TransactionState.ACTIVE) {
        return { kind: 'noop', state };
      }
      const released = finish(TransactionState.ROLLED_BACK, 'rollback');
      logger.debug('Transaction {txnId} rolled back', { released });
      return { kind: 'rolled_back', released };
    },

    terminate(reason: EndReason): RollbackResult {
      if (state !== TransactionState.ACTIVE) {
        return { kind: 'noop', state };
      }
      const released = finish(TransactionState.ROLLED_BACK, reason);
      return { kind: 'rolled_back', released };
    },

    readSet(): ReadEntry[] {
      return [...reads].map(([key, record]) => ({ key, mode: record.mode, version: record.version }));
    },

    pendingWrites(): ReadonlyMap<string, T> {
      const pending = new Map<string, T>();
      for (const [key, { payload }] of writes) {
        pending.set(key, payload);
      }
      return pending;
    },

    heldLocks(): string[] {
      return locks.getHeldLocks(txnId).map((entry) => entry.key);
    },
  };

  return context;
}
