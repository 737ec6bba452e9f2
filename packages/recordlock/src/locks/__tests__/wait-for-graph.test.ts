/**
 * WaitForGraph Tests
 */

import { describe, it, expect } from 'vitest';
import { createTransactionId } from '@recordlock/shared-types';
import { WaitForGraph } from '../wait-for-graph.js';

const a = createTransactionId('txn-a');
const b = createTransactionId('txn-b');
const c = createTransactionId('txn-c');

describe('WaitForGraph', () => {
  it('should find no cycle in a chain', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [b]);
    graph.setWaits(b, 'k2', [c]);

    expect(graph.findCycleFrom(a)).toBeNull();
    expect(graph.edgeCount()).toBe(2);
  });

  it('should return the cycle as a closed path', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [b]);
    graph.setWaits(b, 'k2', [c]);
    graph.setWaits(c, 'k3', [a]);

    expect(graph.findCycleFrom(a)).toEqual([a, b, c, a]);
    expect(graph.findCycleFrom(b)).toEqual([b, c, a, b]);
  });

  it('should ignore self edges', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [a, b]);

    expect(graph.waitsFor(a)).toEqual([b]);
  });

  it('should merge targets across keys', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [b]);
    graph.setWaits(a, 'k2', [b, c]);

    expect(graph.waitsFor(a)).toEqual([b, c]);

    graph.clearWaits(a, 'k2');
    expect(graph.waitsFor(a)).toEqual([b]);
  });

  it('should drop edges when the target list becomes empty', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [b]);
    graph.setWaits(a, 'k1', []);

    expect(graph.edgeCount()).toBe(0);
  });

  it('should remove a transaction as waiter and as target', () => {
    const graph = new WaitForGraph();
    graph.setWaits(a, 'k1', [b]);
    graph.setWaits(b, 'k2', [c]);
    graph.setWaits(c, 'k3', [a]);

    graph.removeTransaction(b);

    expect(graph.waitsFor(a)).toEqual([]);
    expect(graph.waitsFor(c)).toEqual([a]);
    expect(graph.findCycleFrom(c)).toBeNull();
    expect(graph.edgeCount()).toBe(1);
  });
});
