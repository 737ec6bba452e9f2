/**
 * Wait-for graph
 *
 * An edge `a -> b` on key `k` means holder `a` is queued for `k` while
 * `b` holds it. A path from a waiter back to itself is a deadlock.
 *
 * @packageDocumentation
 */

import type { TransactionId } from '@recordlock/shared-types';

export class WaitForGraph {
  /** waiter -> key -> holders it waits on */
  private readonly edges = new Map<TransactionId, Map<string, Set<TransactionId>>>();

  /**
   * Replace the edges of `from` for one key
   */
  setWaits(from: TransactionId, key: string, to: Iterable<TransactionId>): void {
    const targets = new Set<TransactionId>();
    for (const holder of to) {
      if (holder !== from) targets.add(holder);
    }

    let byKey = this.edges.get(from);
    if (targets.size === 0) {
      if (byKey) {
        byKey.delete(key);
        if (byKey.size === 0) this.edges.delete(from);
      }
      return;
    }

    if (!byKey) {
      byKey = new Map();
      this.edges.set(from, byKey);
    }
    byKey.set(key, targets);
  }

  /**
   * Drop the edges of `from`, for one key or all of them
   */
  clearWaits(from: TransactionId, key?: string): void {
    if (key === undefined) {
      this.edges.delete(from);
      return;
    }
    const byKey = this.edges.get(from);
    if (!byKey) return;
    byKey.delete(key);
    if (byKey.size === 0) this.edges.delete(from);
  }

  /**
   * Remove a holder as both waiter and target
   */
  removeTransaction(txnId: TransactionId): void {
    this.edges.delete(txnId);
    for (const [from, byKey] of this.edges) {
      for (const [key, targets] of byKey) {
        targets.delete(txnId);
        if (targets.size === 0) byKey.delete(key);
      }
      if (byKey.size === 0) this.edges.delete(from);
    }
  }

  /**
   * Holders `from` currently waits on
   */
  waitsFor(from: TransactionId): TransactionId[] {
    const result = new Set<TransactionId>();
    for (const targets of this.edges.get(from)?.values() ?? []) {
      for (const target of targets) result.add(target);
    }
    return [...result];
  }

  /**
   * Find a cycle that passes through `start`.
   * Returns the path `[start, ..., start]`, or null.
   */
  findCycleFrom(start: TransactionId): TransactionId[] | null {
    const visited = new Set<TransactionId>([start]);
    const path: TransactionId[] = [start];

    const dfs = (current: TransactionId): TransactionId[] | null => {
      for (const next of this.waitsFor(current)) {
        if (next === start) {
          return [...path, start];
        }
        if (visited.has(next)) continue;
        visited.add(next);
        path.push(next);
        const cycle = dfs(next);
        if (cycle) return cycle;
        path.pop();
      }
      return null;
    };

    return dfs(start);
  }

  edgeCount(): number {
    let count = 0;
    for (const byKey of this.edges.values()) {
      for (const targets of byKey.values()) count += targets.size;
    }
    return count;
  }
}
