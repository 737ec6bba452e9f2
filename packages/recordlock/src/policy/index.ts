/**
 * Conflict policy module
 *
 * @packageDocumentation
 */

export {
  createConflictPolicy,
  backoffDelay,
  neverRetry,
  type ConflictPolicy,
  type ConflictPolicyOptions,
  type Decision,
  type Retry,
  type GiveUp,
  type GiveUpReason,
} from './conflict-policy.js';
export {
  runWithRetry,
  type RetryOutcome,
  type RetryRunResult,
  type RunWithRetryOptions,
} from './retry.js';
