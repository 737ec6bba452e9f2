/**
 * Version Guard
 *
 * Optimistic concurrency over a RecordStore: reads never block, and a
 * write only lands if the record is still at the version the writer saw.
 * First writer wins; the loser gets a VersionMismatch and decides for
 * itself whether to retry.
 *
 * @packageDocumentation
 */

import type { ConflictResult, NotFound } from '@recordlock/shared-types';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import type { BatchResult, BatchWrite, RecordStore } from '../store/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Snapshot taken by an optimistic read
 */
export interface ReadSnapshot<T> {
  readonly kind: 'found';
  readonly key: string;
  readonly payload: T;
  readonly version: number;
}

/**
 * Counters kept by a guard
 */
export interface VersionGuardStats {
  /** Successful single and batch commits */
  commits: number;
  /** Commits rejected by a version mismatch */
  conflicts: number;
}

export interface VersionGuardOptions {
  logger?: StructuredLogger;
}

export interface VersionGuard<T> {
  /**
   * Read the current record. A missing key should be treated as
   * version 0 by callers that go on to write it.
   */
  beginRead(key: string): ReadSnapshot<T> | NotFound;

  /**
   * Write `payload` if the key is still at `expectedVersion`.
   * Never retries.
   */
  tryCommit(key: string, expectedVersion: number, payload: T): ConflictResult;

  /**
   * Apply a write set all-or-nothing
   */
  tryCommitAll(writes: readonly BatchWrite<T>[]): BatchResult;

  stats(): VersionGuardStats;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a version guard over a store
 */
export function createVersionGuard<T>(
  store: RecordStore<T>,
  options: VersionGuardOptions = {}
): VersionGuard<T> {
  const logger = (options.logger ?? createLogger()).child({ component: 'version-guard' });
  const counters: VersionGuardStats = { commits: 0, conflicts: 0 };

  function noteMismatch(key: string, expected: number, actual: number): void {
    counters.conflicts++;
    logger.debug('Version mismatch on {key}', { key, expected, actual });
  }

  return {
    beginRead(key: string): ReadSnapshot<T> | NotFound {
      const result = store.get(key);
      if (result.kind === 'not_found') {
        return result;
      }
      return { kind: 'found', key: result.key, payload: result.payload, version: result.version };
    },

    tryCommit(key: string, expectedVersion: number, payload: T): ConflictResult {
      const result = store.compareAndSet(key, expectedVersion, payload);
      if (result.kind === 'version_mismatch') {
        noteMismatch(key, result.expected, result.actual);
      } else {
        counters.commits++;
      }
      return result;
    },

    tryCommitAll(writes: readonly BatchWrite<T>[]): BatchResult {
      const result = store.applyBatch(writes);
      if (result.kind === 'version_mismatch') {
        noteMismatch(result.key, result.expected, result.actual);
      } else {
        counters.commits++;
      }
      return result;
    },

    stats(): VersionGuardStats {
      return { ...counters };
    },
  };
}
