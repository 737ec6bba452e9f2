/**
 * Lock Table
 *
 * Pessimistic locks keyed by record key, independent of the record
 * store. A key has either one exclusive holder or any number of shared
 * holders. Callers that cannot be granted wait in a FIFO queue per key
 * until a release lets them in, their timeout elapses, or their
 * AbortSignal fires. A shared holder waiting to upgrade queues ahead of
 * requests from non-holders.
 *
 * Grant and release decisions are synchronous; no caller code runs while
 * the table is being updated.
 *
 * @packageDocumentation
 */

import type {
  Cancelled,
  Deadlock,
  LockFailure,
  LockHeldByOther,
  LockMode,
  TransactionId,
} from '@recordlock/shared-types';
import { DEFAULT_CONFIG, assertTimeoutMs } from '../config/index.js';
import { createLogger, type StructuredLogger } from '../logging/index.js';
import { WaitForGraph } from './wait-for-graph.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A granted lock
 */
export interface Acquired {
  readonly kind: 'acquired';
  readonly key: string;
  readonly holder: TransactionId;
  /** Mode now held, which may be stronger than the one requested */
  readonly mode: LockMode;
  /** The holder already held the key in a covering mode */
  readonly reentrant: boolean;
  readonly waitedMs: number;
}

/**
 * A lock removed by its holder
 */
export interface Released {
  readonly kind: 'released';
  readonly key: string;
  readonly holder: TransactionId;
}

export type AcquireResult = Acquired | LockFailure;

export type ReleaseResult = Released | LockHeldByOther;

/**
 * Lock entry as seen from outside the table
 */
export interface LockEntry {
  readonly key: string;
  readonly holder: TransactionId;
  readonly mode: LockMode;
  readonly acquiredAt: number;
}

export interface AcquireOptions {
  /**
   * Longest wait in ms; 0 means do not wait, Infinity waits without a
   * timer (default: lockTimeoutMs). Values outside 0 to MAX_TIMER_MS
   * reject with a RangeError.
   */
  timeoutMs?: number;
  /** Requested mode (default: exclusive) */
  mode?: LockMode;
  /** Aborting removes the waiter and resolves Cancelled */
  signal?: AbortSignal;
}

export interface LockTableOptions {
  lockTimeoutMs?: number;
  maxWaitQueueSize?: number;
  detectDeadlocks?: boolean;
  lockLeaseMs?: number;
  logger?: StructuredLogger;
}

/**
 * Outcome of an abandoned-lock sweep
 */
export interface SweepResult {
  /** Holders reported dead, with all their locks and waits removed */
  evictedHolders: TransactionId[];
  /** Individual locks removed for outliving the lease */
  expiredLocks: LockEntry[];
}

export interface LockTableStats {
  grants: number;
  waits: number;
  timeouts: number;
  cancellations: number;
  deadlocks: number;
  evictions: number;
}

export interface LockTable {
  /**
   * Acquire a lock on `key` for `holder`
   */
  acquire(key: string, holder: TransactionId, options?: AcquireOptions): Promise<AcquireResult>;

  /**
   * Release `holder`'s lock on `key`. A caller that does not hold the
   * key changes nothing and learns who does.
   */
  release(key: string, holder: TransactionId): ReleaseResult;

  /**
   * Release every lock of a holder
   * @returns the released keys
   */
  releaseAll(holder: TransactionId): string[];

  /**
   * Remove a holder entirely: its pending waits resolve Cancelled and
   * its locks are released
   * @returns the released keys
   */
  evictHolder(holder: TransactionId): string[];

  /**
   * Recover abandoned locks: evict holders `isHolderAlive` reports dead,
   * and release locks older than the lease when one is configured
   */
  sweep(isHolderAlive?: (holder: TransactionId) => boolean): SweepResult;

  getHeldLocks(holder: TransactionId): LockEntry[];

  /**
   * The exclusive holder of a key, else its first shared holder, else null
   */
  holderOf(key: string): TransactionId | null;

  /**
   * Every locked or awaited key, in key order
   */
  snapshot(): Array<{ key: string; holders: LockEntry[]; waiters: TransactionId[] }>;

  stats(): LockTableStats;
}

// =============================================================================
// Implementation
// =============================================================================

interface Holding {
  mode: LockMode;
  acquiredAt: number;
}

interface Waiter {
  readonly holder: TransactionId;
  readonly mode: LockMode;
  readonly startedAt: number;
  settle(result: AcquireResult): void;
}

interface KeyState {
  holders: Map<TransactionId, Holding>;
  queue: Waiter[];
}

function covers(held: LockMode, requested: LockMode): boolean {
  return held === 'exclusive' || requested === 'shared';
}

/**
 * Create a lock table
 *
 * @example
 * ```typescript
 * const locks = createLockTable({ lockTimeoutMs: 200 });
 * const result = await locks.acquire('acct:1', txnId);
 * if (result.kind === 'acquired') {
 *   // ... exclusive access to acct:1
 *   locks.release('acct:1', txnId);
 * }
 * ```
 */
export function createLockTable(options: LockTableOptions = {}): LockTable {
  const {
    lockTimeoutMs = DEFAULT_CONFIG.lockTimeoutMs,
    maxWaitQueueSize = DEFAULT_CONFIG.maxWaitQueueSize,
    detectDeadlocks = DEFAULT_CONFIG.detectDeadlocks,
    lockLeaseMs = DEFAULT_CONFIG.lockLeaseMs,
  } = options;
  assertTimeoutMs('lock timeout', lockTimeoutMs);
  const logger = (options.logger ?? createLogger()).child({ component: 'lock-table' });

  const locks = new Map<string, KeyState>();
  const holderKeys = new Map<TransactionId, Set<string>>();
  const graph = new WaitForGraph();
  const counters: LockTableStats = {
    grants: 0,
    waits: 0,
    timeouts: 0,
    cancellations: 0,
    deadlocks: 0,
    evictions: 0,
  };

  function getKeyState(key: string): KeyState {
    let state = locks.get(key);
    if (!state) {
      state = { holders: new Map(), queue: [] };
      locks.set(key, state);
    }
    return state;
  }

  function dropIfIdle(key: string): void {
    const state = locks.get(key);
    if (state && state.holders.size === 0 && state.queue.length === 0) {
      locks.delete(key);
    }
  }

  /**
   * Holders of the key that stand in the way of `requester`
   */
  function blockers(state: KeyState, requester: TransactionId, mode: LockMode): TransactionId[] {
    const result: TransactionId[] = [];
    for (const [holder, holding] of state.holders) {
      if (holder === requester) continue;
      if (mode === 'exclusive' || holding.mode === 'exclusive') {
        result.push(holder);
      }
    }
    return result;
  }

  function canGrant(state: KeyState, requester: TransactionId, mode: LockMode): boolean {
    return blockers(state, requester, mode).length === 0;
  }

  function primaryHolder(state: KeyState | undefined, excluding?: TransactionId): TransactionId | null {
    if (!state) return null;
    let first: TransactionId | null = null;
    for (const [holder, holding] of state.holders) {
      if (holder === excluding) continue;
      if (holding.mode === 'exclusive') return holder;
      first ??= holder;
    }
    return first;
  }

  function grant(state: KeyState, key: string, holder: TransactionId, mode: LockMode): LockMode {
    const existing = state.holders.get(holder);
    const granted: LockMode = existing?.mode === 'exclusive' ? 'exclusive' : mode;
    state.holders.set(holder, { mode: granted, acquiredAt: existing?.acquiredAt ?? Date.now() });

    let keys = holderKeys.get(holder);
    if (!keys) {
      keys = new Set();
      holderKeys.set(holder, keys);
    }
    keys.add(key);

    counters.grants++;
    logger.debug('Lock on {key} granted to {holder}', { key, holder, mode: granted });
    return granted;
  }

  function removeHolding(state: KeyState, key: string, holder: TransactionId): void {
    state.holders.delete(holder);
    const keys = holderKeys.get(holder);
    if (keys) {
      keys.delete(key);
      if (keys.size === 0) holderKeys.delete(holder);
    }
  }

  /**
   * Grant queued requests in FIFO order until one cannot be granted
   */
  function processQueue(key: string): void {
    const state = locks.get(key);
    if (!state) return;

    while (state.queue.length > 0) {
      const next = state.queue[0];
      if (!canGrant(state, next.holder, next.mode)) break;
      state.queue.shift();
      const mode = grant(state, key, next.holder, next.mode);
      next.settle({
        kind: 'acquired',
        key,
        holder: next.holder,
        mode,
        reentrant: false,
        waitedMs: Date.now() - next.startedAt,
      });
    }

    if (detectDeadlocks) {
      for (const waiter of state.queue) {
        graph.setWaits(waiter.holder, key, blockers(state, waiter.holder, waiter.mode));
      }
    }

    dropIfIdle(key);
  }

  function removeWaiter(key: string, waiter: Waiter): boolean {
    const state = locks.get(key);
    if (!state) return false;
    const idx = state.queue.indexOf(waiter);
    if (idx === -1) return false;
    state.queue.splice(idx, 1);
    return true;
  }

  function wait(
    state: KeyState,
    key: string,
    holder: TransactionId,
    mode: LockMode,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<AcquireResult> {
    counters.waits++;
    const startedAt = Date.now();

    return new Promise<AcquireResult>((resolve) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const onAbort = (): void => {
        if (!removeWaiter(key, waiter)) return;
        counters.cancellations++;
        logger.debug('Lock wait on {key} cancelled for {holder}', { key, holder });
        const cancelled: Cancelled = { kind: 'cancelled', key };
        waiter.settle(cancelled);
        processQueue(key);
      };

      const waiter: Waiter = {
        holder,
        mode,
        startedAt,
        settle(result: AcquireResult): void {
          if (timeoutId !== undefined) clearTimeout(timeoutId);
          signal?.removeEventListener('abort', onAbort);
          if (detectDeadlocks) graph.clearWaits(holder, key);
          resolve(result);
        },
      };

      if (timeoutMs !== Infinity) {
        timeoutId = setTimeout(() => {
          if (!removeWaiter(key, waiter)) return;
          const waitedMs = Date.now() - startedAt;
          counters.timeouts++;
          logger.debug('Lock wait on {key} timed out for {holder}', { key, holder, waitedMs });
          waiter.settle({ kind: 'lock_timeout', key, waitedMs });
          processQueue(key);
        }, timeoutMs);
      }

      signal?.addEventListener('abort', onAbort, { once: true });
      if (state.holders.has(holder)) {
        // upgrades go ahead of new requests, behind earlier upgrades
        let idx = 0;
        while (idx < state.queue.length && state.holders.has(state.queue[idx].holder)) idx++;
        state.queue.splice(idx, 0, waiter);
      } else {
        state.queue.push(waiter);
      }
      logger.debug('Waiting for lock on {key}', { key, holder, mode, queueLength: state.queue.length });
    });
  }

  const table: LockTable = {
    async acquire(key: string, holder: TransactionId, acquireOptions: AcquireOptions = {}): Promise<AcquireResult> {
      const mode = acquireOptions.mode ?? 'exclusive';
      const timeoutMs = acquireOptions.timeoutMs ?? lockTimeoutMs;
      assertTimeoutMs('lock timeout', timeoutMs);
      const { signal } = acquireOptions;

      if (signal?.aborted) {
        counters.cancellations++;
        return { kind: 'cancelled', key };
      }

      const state = getKeyState(key);
      const existing = state.holders.get(holder);

      if (existing && covers(existing.mode, mode)) {
        return { kind: 'acquired', key, holder, mode: existing.mode, reentrant: true, waitedMs: 0 };
      }

      // a holder upgrading its own lock does not queue behind others
      if (canGrant(state, holder, mode) && (existing || state.queue.length === 0)) {
        const granted = grant(state, key, holder, mode);
        return { kind: 'acquired', key, holder, mode: granted, reentrant: false, waitedMs: 0 };
      }

      if (timeoutMs <= 0 || state.queue.length >= maxWaitQueueSize) {
        const refused: LockHeldByOther = { kind: 'lock_held_by_other', key, holder: primaryHolder(state, holder) };
        dropIfIdle(key);
        return refused;
      }

      if (detectDeadlocks) {
        graph.setWaits(holder, key, blockers(state, holder, mode));
        const cycle = graph.findCycleFrom(holder);
        if (cycle) {
          graph.clearWaits(holder, key);
          counters.deadlocks++;
          logger.warn('Deadlock on {key}: {holder} would close a wait cycle', { key, holder, cycle });
          const deadlock: Deadlock = { kind: 'deadlock', key, cycle };
          return deadlock;
        }
      }

      return wait(state, key, holder, mode, timeoutMs, signal);
    },

    release(key: string, holder: TransactionId): ReleaseResult {
      const state = locks.get(key);
      if (!state || !state.holders.has(holder)) {
        const actual = primaryHolder(state);
        logger.debug('Release of {key} by {holder} refused', { key, holder, actual });
        return { kind: 'lock_held_by_other', key, holder: actual };
      }

      removeHolding(state, key, holder);
      processQueue(key);
      return { kind: 'released', key, holder };
    },

    releaseAll(holder: TransactionId): string[] {
      const keys = [...(holderKeys.get(holder) ?? [])];
      for (const key of keys) {
        table.release(key, holder);
      }
      return keys;
    },

    evictHolder(holder: TransactionId): string[] {
      const waits: Array<[string, Waiter]> = [];
      for (const [key, state] of locks) {
        for (const waiter of state.queue) {
          if (waiter.holder === holder) waits.push([key, waiter]);
        }
      }
      for (const [key, waiter] of waits) {
        removeWaiter(key, waiter);
        counters.cancellations++;
        waiter.settle({ kind: 'cancelled', key });
        processQueue(key);
      }

      const released = table.releaseAll(holder);
      graph.removeTransaction(holder);

      if (released.length > 0 || waits.length > 0) {
        counters.evictions++;
        logger.warn('Evicted lock holder {holder}', { holder, released, cancelledWaits: waits.length });
      }
      return released;
    },

    sweep(isHolderAlive?: (holder: TransactionId) => boolean): SweepResult {
      const now = Date.now();
      const dead = new Set<TransactionId>();
      const expired: LockEntry[] = [];

      for (const [key, state] of locks) {
        if (isHolderAlive) {
          for (const waiter of state.queue) {
            if (!isHolderAlive(waiter.holder)) dead.add(waiter.holder);
          }
        }
        for (const [holder, holding] of state.holders) {
          if (isHolderAlive && !isHolderAlive(holder)) {
            dead.add(holder);
          } else if (lockLeaseMs > 0 && now - holding.acquiredAt >= lockLeaseMs) {
            expired.push({ key, holder, mode: holding.mode, acquiredAt: holding.acquiredAt });
          }
        }
      }

      for (const holder of dead) {
        table.evictHolder(holder);
      }
      for (const entry of expired) {
        if (dead.has(entry.holder)) continue;
        table.release(entry.key, entry.holder);
        logger.warn('Lock on {key} held by {holder} outlived its lease', {
          key: entry.key,
          holder: entry.holder,
          heldMs: now - entry.acquiredAt,
        });
      }

      return {
        evictedHolders: [...dead],
        expiredLocks: expired.filter((entry) => !dead.has(entry.holder)),
      };
    },

    getHeldLocks(holder: TransactionId): LockEntry[] {
      const held: LockEntry[] = [];
      for (const key of holderKeys.get(holder) ?? []) {
        const holding = locks.get(key)?.holders.get(holder);
        if (holding) {
          held.push({ key, holder, mode: holding.mode, acquiredAt: holding.acquiredAt });
        }
      }
      return held;
    },

    holderOf(key: string): TransactionId | null {
      return primaryHolder(locks.get(key));
    },

    snapshot() {
      return [...locks.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, state]) => ({
          key,
          holders: [...state.holders].map(([holder, holding]) => ({
            key,
            holder,
            mode: holding.mode,
            acquiredAt: holding.acquiredAt,
          })),
          waiters: state.queue.map((waiter) => waiter.holder),
        }));
    },

    stats(): LockTableStats {
      return { ...counters };
    },
  };

  return table;
}
