/**
 * Conflict Policy
 *
 * Decides what a caller does after a conflict: try again after a delay,
 * or give up. Only version mismatches are retried; lock failures go back
 * to the caller as they are.
 *
 * @packageDocumentation
 */

import type { ResultValue } from '@recordlock/shared-types';
import { DEFAULT_CONFIG, type RecordLockConfig } from '../config/index.js';

// =============================================================================
// Types
// =============================================================================

export interface Retry {
  readonly kind: 'retry';
  readonly delayMs: number;
}

export type GiveUpReason =
  /** nothing to retry */
  | 'success'
  /** the result kind is never retried */
  | 'not_retryable'
  /** attempt exceeded maxOptimisticRetries */
  | 'retries_exhausted';

export interface GiveUp {
  readonly kind: 'give_up';
  readonly reason: GiveUpReason;
}

export type Decision = Retry | GiveUp;

export interface ConflictPolicy {
  /**
   * @param result outcome of the attempt that just finished
   * @param attempt 1 for the first attempt
   */
  decide(result: Pick<ResultValue, 'kind'>, attempt: number): Decision;
}

export interface ConflictPolicyOptions
  extends Partial<Pick<RecordLockConfig, 'maxOptimisticRetries' | 'backoffBaseMs' | 'backoffJitterMs' | 'backoffMaxMs'>> {
  /** Source of randomness in [0, 1) (default: Math.random) */
  random?: () => number;
}

// =============================================================================
// Default Policy
// =============================================================================

/**
 * Delay before retry number `attempt`: exponential from `backoffBaseMs`,
 * capped at `backoffMaxMs`, plus up to `backoffJitterMs` of jitter
 */
export function backoffDelay(
  attempt: number,
  options: Required<Omit<ConflictPolicyOptions, 'maxOptimisticRetries'>>
): number {
  const exponential = options.backoffBaseMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(options.backoffMaxMs, exponential);
  return capped + Math.floor(options.random() * options.backoffJitterMs);
}

/**
 * Create the default policy
 *
 * @example
 * ```typescript
 * const policy = createConflictPolicy({ maxOptimisticRetries: 5 });
 * const decision = policy.decide(result, attempt);
 * if (decision.kind === 'retry') await sleep(decision.delayMs);
 * ```
 */
export function createConflictPolicy(options: ConflictPolicyOptions = {}): ConflictPolicy {
  const maxOptimisticRetries = options.maxOptimisticRetries ?? DEFAULT_CONFIG.maxOptimisticRetries;
  const backoff = {
    backoffBaseMs: options.backoffBaseMs ?? DEFAULT_CONFIG.backoffBaseMs,
    backoffJitterMs: options.backoffJitterMs ?? DEFAULT_CONFIG.backoffJitterMs,
    backoffMaxMs: options.backoffMaxMs ?? DEFAULT_CONFIG.backoffMaxMs,
    random: options.random ?? Math.random,
  };

  return {
    decide(result: Pick<ResultValue, 'kind'>, attempt: number): Decision {
      switch (result.kind) {
        case 'success':
          return { kind: 'give_up', reason: 'success' };
        case 'version_mismatch':
          if (attempt > maxOptimisticRetries) {
            return { kind: 'give_up', reason: 'retries_exhausted' };
          }
          return { kind: 'retry', delayMs: backoffDelay(attempt, backoff) };
        default:
          return { kind: 'give_up', reason: 'not_retryable' };
      }
    },
  };
}

/**
 * A policy that never retries
 */
export const neverRetry: ConflictPolicy = {
  decide(result: Pick<ResultValue, 'kind'>): Decision {
    return { kind: 'give_up', reason: result.kind === 'success' ? 'success' : 'not_retryable' };
  },
};
