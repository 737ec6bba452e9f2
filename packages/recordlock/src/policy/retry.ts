/**
 * Retry executor
 *
 * Runs a unit of work in a fresh transaction per attempt, commits it and
 * asks a conflict policy whether to go again.
 *
 * @packageDocumentation
 */

import type { LockFailure, VersionMismatch } from '@recordlock/shared-types';
import { describeResult } from '@recordlock/shared-types';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import type { TransactionManager } from '../transaction/manager.js';
import {
  TransactionState,
  type CommitSuccess,
  type TransactionContext,
  type TransactionOptions,
} from '../transaction/types.js';
import { sleep } from '../utils/sleep.js';
import { createConflictPolicy, type ConflictPolicy } from './conflict-policy.js';

/**
 * Final outcome of a run. `rolled_back` means the work rolled its own
 * transaction back.
 */
export type RetryOutcome = CommitSuccess | VersionMismatch | LockFailure | { readonly kind: 'rolled_back' };

export interface RetryRunResult<R> {
  outcome: RetryOutcome;
  /** Attempts made, including the last */
  attempts: number;
  /** What the work returned on the last attempt, unless it conflicted */
  value?: R;
}

export interface RunWithRetryOptions {
  /** Default: the manager's configured backoff policy */
  policy?: ConflictPolicy;
  /** Options for each attempt's transaction */
  transaction?: Omit<TransactionOptions, 'txnId' | 'signal'>;
  /** Cancels lock waits and backoff sleeps */
  signal?: AbortSignal;
  logger?: StructuredLogger;
}

/**
 * Run `work` until it commits, the policy gives up, or `signal` aborts.
 *
 * `work` reads and writes through the context it is given; it must not
 * commit. Throwing from `work` rolls the attempt back and rethrows.
 *
 * @example
 * ```typescript
 * const { outcome, attempts } = await runWithRetry(manager, async (tx) => {
 *   const account = await tx.read('acct:1');
 *   if (account.kind === 'found') {
 *     tx.write('acct:1', { balance: account.payload.balance + 50 });
 *   }
 * });
 * ```
 */
export async function runWithRetry<T, R>(
  manager: TransactionManager<T>,
  work: (context: TransactionContext<T>) => R | Promise<R>,
  options: RunWithRetryOptions = {}
): Promise<RetryRunResult<R>> {
  const { signal } = options;
  const policy = options.policy ?? createConflictPolicy(manager.config);
  const logger = (options.logger ?? createLogger()).child({ component: 'retry' });

  for (let attempt = 1; ; attempt++) {
    const context = manager.begin({ ...options.transaction, signal });

    let value: R;
    try {
      value = await work(context);
    } catch (error) {
      context.rollback();
      throw error;
    }

    let outcome: RetryOutcome;
    if (context.state === TransactionState.ROLLED_BACK && context.conflict) {
      outcome = context.conflict;
    } else if (context.state === TransactionState.ROLLED_BACK && context.endReason === 'rollback') {
      return { outcome: { kind: 'rolled_back' }, attempts: attempt, value };
    } else {
      // throws for a transaction that timed out or was already committed
      outcome = context.commit();
    }

    if (outcome.kind === 'success') {
      return { outcome, attempts: attempt, value };
    }

    const decision = policy.decide(outcome, attempt);
    if (decision.kind === 'give_up') {
      logger.debug('Giving up after {attempts} attempt(s): {detail}', {
        attempts: attempt,
        detail: describeResult(outcome),
        reason: decision.reason,
      });
      return { outcome, attempts: attempt };
    }

    logger.info('Retrying in {delayMs}ms: {detail}', {
      attempt,
      delayMs: decision.delayMs,
      detail: describeResult(outcome),
    });
    await sleep(decision.delayMs, signal);
    if (signal?.aborted) {
      return { outcome, attempts: attempt };
    }
  }
}
