/**
 * Transaction Types
 *
 * @packageDocumentation
 */

import type {
  LockFailure,
  NotFound,
  ReadMode,
  TransactionId,
  VersionMismatch,
} from '@recordlock/shared-types';
import type { ReadSnapshot } from '../guard/version-guard.js';

// =============================================================================
// State
// =============================================================================

/**
 * Transaction lifecycle. ACTIVE is the only non-terminal state.
 */
export enum TransactionState {
  ACTIVE = 'ACTIVE',
  COMMITTED = 'COMMITTED',
  ROLLED_BACK = 'ROLLED_BACK',
}

/**
 * Why a transaction left ACTIVE
 */
export type EndReason =
  /** commit applied */
  | 'commit'
  /** rollback() by the caller */
  | 'rollback'
  /** commit or an upgrading read met a version mismatch */
  | 'conflict'
  /** a pessimistic read could not get its lock */
  | 'lock_failure'
  /** the store failed during commit */
  | 'error'
  /** the transaction timeout expired */
  | 'timeout'
  /** reaped as abandoned */
  | 'evicted'
  /** the manager was closed */
  | 'closed';

// =============================================================================
// Options and Results
// =============================================================================

export interface TransactionOptions {
  /** Explicit id (default: generated) */
  txnId?: TransactionId | string;
  /** Auto rollback after this many ms, 0 or Infinity disables (default: transactionTimeoutMs) */
  timeoutMs?: number;
  /** Wait for each pessimistic lock (default: lockTimeoutMs) */
  lockTimeoutMs?: number;
  /** Aborting cancels pending lock waits */
  signal?: AbortSignal;
}

/**
 * An entry of the read set
 */
export interface ReadEntry {
  readonly key: string;
  readonly mode: ReadMode;
  /** Version observed by the read, 0 when the key did not exist */
  readonly version: number;
}

/**
 * Outcome of `read`. Lock failures and an upgrade that finds the
 * version moved end the transaction.
 */
export type ReadResult<T> = ReadSnapshot<T> | NotFound | VersionMismatch | LockFailure;

export interface CommitSuccess {
  readonly kind: 'success';
  readonly txnId: TransactionId;
  /** New version of every written key */
  readonly versions: ReadonlyMap<string, number>;
}

export type CommitResult = CommitSuccess | VersionMismatch;

export type RollbackResult =
  | { readonly kind: 'rolled_back'; readonly released: string[] }
  | { readonly kind: 'noop'; readonly state: TransactionState };

// =============================================================================
// Context
// =============================================================================

/**
 * A single unit of work. Single use: once committed or rolled back, only
 * `rollback()` and the introspection members may be called.
 */
export interface TransactionContext<T> {
  readonly txnId: TransactionId;
  readonly startedAt: number;
  readonly state: TransactionState;
  /** null while ACTIVE */
  readonly endReason: EndReason | null;
  /** The conflict that rolled the transaction back, if one did */
  readonly conflict: VersionMismatch | LockFailure | null;

  /**
   * Read a record. `pessimistic` takes an exclusive lock first and holds
   * it until the transaction ends.
   */
  read(key: string, mode?: ReadMode): Promise<ReadResult<T>>;

  /**
   * Buffer a write; nothing reaches the store before commit
   */
  write(key: string, payload: T): void;

  /**
   * Apply every buffered write, or none. Locks are released whatever
   * the outcome.
   * @throws TransactionError(COMMIT_FAILED) when the store throws
   */
  commit(): CommitResult;

  /**
   * Discard buffered writes and release locks. A no-op on a finished
   * transaction.
   */
  rollback(): RollbackResult;

  readSet(): ReadEntry[];
  pendingWrites(): ReadonlyMap<string, T>;
  heldLocks(): string[];
}
