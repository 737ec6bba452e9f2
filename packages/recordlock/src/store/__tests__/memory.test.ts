/**
 * MemoryRecordStore Tests
 */

import { describe, it, expect } from 'vitest';
import { MemoryRecordStore } from '../memory.js';

interface Account {
  balance: number;
}

describe('MemoryRecordStore', () => {
  describe('get', () => {
    it('should return not_found for a missing key', () => {
      const store = new MemoryRecordStore<Account>();
      expect(store.get('acct:1')).toEqual({ kind: 'not_found', key: 'acct:1' });
    });

    it('should return seeded records at version 1', () => {
      const store = new MemoryRecordStore<Account>([['acct:1', { balance: 100 }]]);
      expect(store.get('acct:1')).toEqual({
        kind: 'found',
        key: 'acct:1',
        payload: { balance: 100 },
        version: 1,
      });
    });
  });

  describe('payload isolation', () => {
    it('should not let a caller change a stored payload through a read', () => {
      const store = new MemoryRecordStore<Account>([['acct:1', { balance: 100 }]]);

      const read = store.get('acct:1');
      if (read.kind === 'found') read.payload.balance = 0;

      expect(store.get('acct:1')).toMatchObject({ payload: { balance: 100 }, version: 1 });
    });

    it('should not let a caller change a stored payload after writing it', () => {
      const store = new MemoryRecordStore<Account>();
      const payload = { balance: 5 };

      store.compareAndSet('acct:1', 0, payload);
      payload.balance = 6;

      expect(store.get('acct:1')).toMatchObject({ payload: { balance: 5 }, version: 1 });
    });
  });

  describe('compareAndSet', () => {
    it('should create a missing key when expecting version 0', () => {
      const store = new MemoryRecordStore<Account>();
      expect(store.compareAndSet('acct:1', 0, { balance: 10 })).toEqual({
        kind: 'success',
        key: 'acct:1',
        version: 1,
      });
    });

    it('should report actual 0 when the key is missing', () => {
      const store = new MemoryRecordStore<Account>();
      expect(store.compareAndSet('acct:1', 3, { balance: 10 })).toEqual({
        kind: 'version_mismatch',
        key: 'acct:1',
        expected: 3,
        actual: 0,
      });
      expect(store.size()).toBe(0);
    });

    it('should let exactly one of two writers with the same expected version win', () => {
      const store = new MemoryRecordStore<Account>([['acct:1', { balance: 100 }]]);

      const first = store.compareAndSet('acct:1', 1, { balance: 150 });
      const second = store.compareAndSet('acct:1', 1, { balance: 200 });

      expect(first).toEqual({ kind: 'success', key: 'acct:1', version: 2 });
      expect(second).toEqual({ kind: 'version_mismatch', key: 'acct:1', expected: 1, actual: 2 });

      const current = store.get('acct:1');
      expect(current.kind === 'found' && current.payload).toEqual({ balance: 150 });
    });

    it('should reject an existing key when expecting version 0', () => {
      const store = new MemoryRecordStore<Account>([['acct:1', { balance: 100 }]]);
      expect(store.compareAndSet('acct:1', 0, { balance: 1 })).toEqual({
        kind: 'version_mismatch',
        key: 'acct:1',
        expected: 0,
        actual: 1,
      });
    });

    it('should throw RangeError for invalid versions', () => {
      const store = new MemoryRecordStore<Account>();
      expect(() => store.compareAndSet('acct:1', -1, { balance: 1 })).toThrow(RangeError);
      expect(() => store.compareAndSet('acct:1', 1.5, { balance: 1 })).toThrow(RangeError);
    });
  });

  describe('forceSet', () => {
    it('should create at 1 and increment on every write', () => {
      const store = new MemoryRecordStore<Account>();
      expect(store.forceSet('acct:1', { balance: 1 })).toBe(1);
      expect(store.forceSet('acct:1', { balance: 2 })).toBe(2);
      expect(store.forceSet('acct:1', { balance: 3 })).toBe(3);
    });

    it('should never decrease or repeat a version across mixed writes', () => {
      const store = new MemoryRecordStore<Account>();
      const seen: number[] = [];

      seen.push(store.forceSet('k', { balance: 0 }));
      for (let i = 0; i < 10; i++) {
        if (i % 2 === 0) {
          seen.push(store.forceSet('k', { balance: i }));
        } else {
          const current = store.get('k');
          const result = store.compareAndSet('k', current.kind === 'found' ? current.version : 0, { balance: i });
          if (result.kind === 'success') seen.push(result.version);
        }
      }

      expect(seen).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
    });
  });

  describe('applyBatch', () => {
    it('should apply every write and return the new versions', () => {
      const store = new MemoryRecordStore<Account>([
        ['acct:1', { balance: 100 }],
        ['acct:2', { balance: 50 }],
      ]);

      const result = store.applyBatch([
        { kind: 'cas', key: 'acct:1', expectedVersion: 1, payload: { balance: 70 } },
        { kind: 'force', key: 'acct:2', payload: { balance: 80 } },
        { kind: 'cas', key: 'acct:3', expectedVersion: 0, payload: { balance: 0 } },
      ]);

      expect(result.kind).toBe('success');
      if (result.kind === 'success') {
        expect([...result.versions]).toEqual([
          ['acct:1', 2],
          ['acct:2', 2],
          ['acct:3', 1],
        ]);
      }
      expect(store.keys()).toEqual(['acct:1', 'acct:2', 'acct:3']);
    });

    it('should apply nothing when any compare fails', () => {
      const store = new MemoryRecordStore<Account>([
        ['acct:1', { balance: 100 }],
        ['acct:2', { balance: 50 }],
      ]);
      store.forceSet('acct:2', { balance: 55 });

      const result = store.applyBatch([
        { kind: 'force', key: 'acct:1', payload: { balance: 0 } },
        { kind: 'cas', key: 'acct:2', expectedVersion: 1, payload: { balance: 0 } },
      ]);

      expect(result).toEqual({ kind: 'version_mismatch', key: 'acct:2', expected: 1, actual: 2 });
      expect(store.get('acct:1')).toEqual({ kind: 'found', key: 'acct:1', payload: { balance: 100 }, version: 1 });
      expect(store.get('acct:2')).toEqual({ kind: 'found', key: 'acct:2', payload: { balance: 55 }, version: 2 });
    });

    it('should reject a batch naming a key twice', () => {
      const store = new MemoryRecordStore<Account>();
      expect(() =>
        store.applyBatch([
          { kind: 'force', key: 'acct:1', payload: { balance: 1 } },
          { kind: 'force', key: 'acct:1', payload: { balance: 2 } },
        ])
      ).toThrow("Batch writes key 'acct:1' more than once");
      expect(store.size()).toBe(0);
    });
  });

  it('should list keys in ascending order', () => {
    const store = new MemoryRecordStore<Account>([
      ['b', { balance: 1 }],
      ['c', { balance: 1 }],
      ['a', { balance: 1 }],
    ]);
    expect(store.keys()).toEqual(['a', 'b', 'c']);
    expect(store.size()).toBe(3);
  });
});
