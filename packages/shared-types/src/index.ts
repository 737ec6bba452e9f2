/**
 * @recordlock/shared-types - Shared types for the recordlock packages
 *
 * This package provides the canonical definitions for:
 * - Branded transaction identifiers
 * - Lock and read modes
 * - The tagged result values returned by every store, lock and
 *   transaction operation
 *
 * Conflicts are values, not exceptions: every outcome a caller has to
 * react to is one variant of a discriminated union keyed by `kind`.
 *
 * @packageDocumentation
 */

// =============================================================================
// Branded Types
// =============================================================================

declare const TransactionIdBrand: unique symbol;

/**
 * Branded type for transaction IDs
 *
 * A TransactionId identifies a unit of work and doubles as the lock holder
 * identity. Use `createTransactionId()` or `generateTransactionId()` to
 * create instances.
 *
 * @example
 * ```typescript
 * const txnId = createTransactionId('txn-import-42');
 * lockTable.acquire('acct:1', txnId, { timeoutMs: 1000 });
 * ```
 */
export type TransactionId = string & { readonly [TransactionIdBrand]: never };

/**
 * Create a typed TransactionId from a string.
 * @throws Error if id is empty or whitespace-only
 */
export function createTransactionId(id: string): TransactionId {
  if (id.trim().length === 0) {
    throw new Error('TransactionId cannot be empty');
  }
  return id as TransactionId;
}

/**
 * Generate a fresh TransactionId of the form `txn_<time>_<random>`
 */
export function generateTransactionId(): TransactionId {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return createTransactionId(`txn_${timestamp}_${random}`);
}

/**
 * Check if a value is a usable TransactionId (non-empty string)
 */
export function isValidTransactionId(value: unknown): value is TransactionId {
  return typeof value === 'string' && value.trim().length > 0;
}

// =============================================================================
// Modes
// =============================================================================

/**
 * Lock modes held in the lock table.
 *
 * Any number of `shared` holders may coexist; an `exclusive` holder is
 * alone on its key.
 */
export type LockMode = 'exclusive' | 'shared';

/**
 * How a transaction reads a record.
 *
 * - optimistic: no lock, version checked at commit
 * - pessimistic: exclusive lock taken before the read, held to the end
 */
export type ReadMode = 'optimistic' | 'pessimistic';

// =============================================================================
// Result Variants
// =============================================================================

/**
 * A write was applied; `version` is the record's new version.
 */
export interface Success {
  readonly kind: 'success';
  readonly key: string;
  readonly version: number;
}

/**
 * A conditional write found a different version than expected.
 * `actual` is 0 when the key does not exist.
 */
export interface VersionMismatch {
  readonly kind: 'version_mismatch';
  readonly key: string;
  readonly expected: number;
  readonly actual: number;
}

/**
 * A lock wait ran out of time.
 */
export interface LockTimeout {
  readonly kind: 'lock_timeout';
  readonly key: string;
  readonly waitedMs: number;
}

/**
 * The key is locked by someone else (no-wait acquire, full wait queue,
 * or a release by a caller that does not own the lock). `holder` is null
 * when the key is not locked at all.
 */
export interface LockHeldByOther {
  readonly kind: 'lock_held_by_other';
  readonly key: string;
  readonly holder: TransactionId | null;
}

/**
 * A lock wait was interrupted through its AbortSignal.
 */
export interface Cancelled {
  readonly kind: 'cancelled';
  readonly key: string;
}

/**
 * Waiting for the key would close a cycle in the wait-for graph.
 * Only produced when deadlock detection is enabled.
 */
export interface Deadlock {
  readonly kind: 'deadlock';
  readonly key: string;
  readonly cycle: readonly TransactionId[];
}

/**
 * The key has no record.
 */
export interface NotFound {
  readonly kind: 'not_found';
  readonly key: string;
}

/**
 * Every outcome of a lock wait that did not end in a grant
 */
export type LockFailure = LockTimeout | LockHeldByOther | Cancelled | Deadlock;

/**
 * Tagged outcome of a write attempt
 */
export type ConflictResult = Success | VersionMismatch | LockFailure;

/**
 * Any result value defined in this package
 */
export type ResultValue = ConflictResult | NotFound;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Narrow a result to Success
 */
export function isSuccess<R extends { readonly kind: string }>(
  result: R
): result is Extract<R, { kind: 'success' }> {
  return result.kind === 'success';
}

/**
 * True for the variants that mean "another party got in the way"
 */
export function isConflict(result: { readonly kind: string }): result is VersionMismatch | LockFailure {
  switch (result.kind) {
    case 'version_mismatch':
    case 'lock_timeout':
    case 'lock_held_by_other':
    case 'cancelled':
    case 'deadlock':
      return true;
    default:
      return false;
  }
}

/**
 * True for the lock-wait failure variants
 */
export function isLockFailure(result: { readonly kind: string }): result is LockFailure {
  return (
    result.kind === 'lock_timeout' ||
    result.kind === 'lock_held_by_other' ||
    result.kind === 'cancelled' ||
    result.kind === 'deadlock'
  );
}

/**
 * One-line description of a result, for log messages and errors
 */
export function describeResult(result: ResultValue): string {
  switch (result.kind) {
    case 'success':
      return `${result.key}: written at version ${result.version}`;
    case 'version_mismatch':
      return `${result.key}: expected version ${result.expected}, found ${result.actual}`;
    case 'lock_timeout':
      return `${result.key}: lock wait timed out after ${result.waitedMs}ms`;
    case 'lock_held_by_other':
      return result.holder === null
        ? `${result.key}: not locked`
        : `${result.key}: locked by ${result.holder}`;
    case 'cancelled':
      return `${result.key}: lock wait cancelled`;
    case 'deadlock':
      return `${result.key}: deadlock between ${result.cycle.join(' -> ')}`;
    case 'not_found':
      return `${result.key}: not found`;
  }
}
