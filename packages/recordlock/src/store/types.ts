/**
 * Record Store Types
 *
 * The record store is the only holder of record data. Every mutation goes
 * through one of its atomic primitives; higher layers only ever keep a
 * key and an expected version between calls.
 *
 * @packageDocumentation
 */

import type { NotFound, Success, VersionMismatch } from '@recordlock/shared-types';

/**
 * A versioned record. `version` starts at 1 on creation and strictly
 * increases on every successful write to the key.
 */
export interface StoredRecord<T> {
  readonly key: string;
  readonly payload: T;
  readonly version: number;
}

/**
 * Result of a lookup
 */
export type GetResult<T> = ({ readonly kind: 'found' } & StoredRecord<T>) | NotFound;

/**
 * Result of a compare-and-set
 */
export type CompareAndSetResult = Success | VersionMismatch;

/**
 * Conditional write inside a batch: applies only if the key is at
 * `expectedVersion` (0 = key must not exist)
 */
export interface CasWrite<T> {
  readonly kind: 'cas';
  readonly key: string;
  readonly expectedVersion: number;
  readonly payload: T;
}

/**
 * Unconditional write inside a batch
 */
export interface ForceWrite<T> {
  readonly kind: 'force';
  readonly key: string;
  readonly payload: T;
}

export type BatchWrite<T> = CasWrite<T> | ForceWrite<T>;

/**
 * Result of an atomic batch: every write applied, or none
 */
export type BatchResult =
  | { readonly kind: 'success'; readonly versions: ReadonlyMap<string, number> }
  | VersionMismatch;

/**
 * Durable keyed storage of versioned records.
 *
 * All operations are synchronous and never wait on other callers.
 * `compareAndSet`, `forceSet` and `applyBatch` are each a single
 * indivisible step with respect to every other caller of the same store.
 */
export interface RecordStore<T> {
  /**
   * Current record for a key
   */
  get(key: string): GetResult<T>;

  /**
   * Store `payload` and bump the version if the key is at
   * `expectedVersion`. A mismatch changes nothing and reports the actual
   * version (0 when the key is absent).
   */
  compareAndSet(key: string, expectedVersion: number, payload: T): CompareAndSetResult;

  /**
   * Store `payload` regardless of the current version
   * @returns the new version
   */
  forceSet(key: string, payload: T): number;

  /**
   * Apply several writes as one unit. On the first CAS mismatch (in write
   * order) nothing is applied and the mismatch is returned.
   */
  applyBatch(writes: readonly BatchWrite<T>[]): BatchResult;

  /**
   * Number of records
   */
  size(): number;

  /**
   * All keys, in ascending order
   */
  keys(): string[];
}

/**
 * Validate a version number supplied by a caller
 */
export function assertVersion(version: number): void {
  if (!Number.isSafeInteger(version) || version < 0) {
    throw new RangeError(`Invalid version ${version}: expected a non-negative integer`);
  }
}

/**
 * A batch may name each key at most once
 */
export function assertUniqueKeys(writes: readonly { readonly key: string }[]): void {
  const seen = new Set<string>();
  for (const write of writes) {
    if (seen.has(write.key)) {
      throw new RangeError(`Batch writes key '${write.key}' more than once`);
    }
    seen.add(write.key);
  }
}
