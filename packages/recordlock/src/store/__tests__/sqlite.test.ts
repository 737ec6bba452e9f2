/**
 * SqliteRecordStore Tests
 *
 * Uses private in-memory databases.
 */

import { describe, it, expect, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { StoreError, StoreErrorCode } from '../../errors/index.js';
import { jsonCodec } from '../codec.js';
import { SqliteRecordStore } from '../sqlite.js';

const Account = z.object({ balance: z.number() });
type Account = z.infer<typeof Account>;

describe('SqliteRecordStore', () => {
  const opened: SqliteRecordStore<Account>[] = [];

  function createStore(table?: string): SqliteRecordStore<Account> {
    const store = new SqliteRecordStore({ database: ':memory:', codec: jsonCodec(Account), table });
    opened.push(store);
    return store;
  }

  afterEach(() => {
    for (const store of opened.splice(0)) {
      store.close();
    }
  });

  describe('single-key operations', () => {
    it('should return not_found for a missing key', () => {
      const store = createStore();
      expect(store.get('acct:1')).toEqual({ kind: 'not_found', key: 'acct:1' });
    });

    it('should create with compareAndSet at version 0 and read the record back', () => {
      const store = createStore();
      expect(store.compareAndSet('acct:1', 0, { balance: 100 })).toEqual({
        kind: 'success',
        key: 'acct:1',
        version: 1,
      });
      expect(store.get('acct:1')).toEqual({
        kind: 'found',
        key: 'acct:1',
        payload: { balance: 100 },
        version: 1,
      });
    });

    it('should let the first of two writers win', () => {
      const store = createStore();
      store.forceSet('acct:1', { balance: 100 });

      expect(store.compareAndSet('acct:1', 1, { balance: 150 })).toEqual({
        kind: 'success',
        key: 'acct:1',
        version: 2,
      });
      expect(store.compareAndSet('acct:1', 1, { balance: 200 })).toEqual({
        kind: 'version_mismatch',
        key: 'acct:1',
        expected: 1,
        actual: 2,
      });
      expect(store.get('acct:1')).toMatchObject({ payload: { balance: 150 }, version: 2 });
    });

    it('should refuse to create a key that exists', () => {
      const store = createStore();
      store.forceSet('acct:1', { balance: 100 });
      expect(store.compareAndSet('acct:1', 0, { balance: 1 })).toEqual({
        kind: 'version_mismatch',
        key: 'acct:1',
        expected: 0,
        actual: 1,
      });
    });

    it('should increment the version on every forceSet', () => {
      const store = createStore();
      expect(store.forceSet('acct:1', { balance: 1 })).toBe(1);
      expect(store.forceSet('acct:1', { balance: 2 })).toBe(2);
      expect(store.get('acct:1')).toMatchObject({ payload: { balance: 2 }, version: 2 });
    });
  });

  describe('applyBatch', () => {
    it('should commit all writes in one transaction', () => {
      const store = createStore();
      store.forceSet('acct:1', { balance: 100 });

      const result = store.applyBatch([
        { kind: 'cas', key: 'acct:1', expectedVersion: 1, payload: { balance: 60 } },
        { kind: 'cas', key: 'acct:2', expectedVersion: 0, payload: { balance: 40 } },
      ]);

      expect(result.kind).toBe('success');
      if (result.kind === 'success') {
        expect(result.versions.get('acct:1')).toBe(2);
        expect(result.versions.get('acct:2')).toBe(1);
      }
      expect(store.keys()).toEqual(['acct:1', 'acct:2']);
    });

    it('should leave every record untouched on a mismatch', () => {
      const store = createStore();
      store.forceSet('acct:1', { balance: 100 });
      store.forceSet('acct:2', { balance: 50 });

      const result = store.applyBatch([
        { kind: 'force', key: 'acct:1', payload: { balance: 0 } },
        { kind: 'cas', key: 'acct:2', expectedVersion: 7, payload: { balance: 0 } },
      ]);

      expect(result).toEqual({ kind: 'version_mismatch', key: 'acct:2', expected: 7, actual: 1 });
      expect(store.get('acct:1')).toMatchObject({ payload: { balance: 100 }, version: 1 });
      expect(store.get('acct:2')).toMatchObject({ payload: { balance: 50 }, version: 1 });
    });
  });

  describe('table and database handling', () => {
    it('should reject a table name that is not an identifier', () => {
      expect(() => createStore('records; DROP TABLE x')).toThrow("Invalid table name 'records; DROP TABLE x'");

      let caught: unknown;
      try {
        createStore('1records');
      } catch (error) {
        caught = error;
      }
      expect(caught instanceof StoreError && caught.code).toBe(StoreErrorCode.INVALID_TABLE);
    });

    it('should keep stores on different tables of one database apart', () => {
      const db = new Database(':memory:');
      const left = new SqliteRecordStore({ database: db, codec: jsonCodec(Account), table: 'left_records' });
      const right = new SqliteRecordStore({ database: db, codec: jsonCodec(Account), table: 'right_records' });

      left.forceSet('acct:1', { balance: 1 });

      expect(right.get('acct:1')).toEqual({ kind: 'not_found', key: 'acct:1' });
      expect(left.size()).toBe(1);

      left.close();
      // a handle supplied by the caller stays open
      expect(db.open).toBe(true);
      db.close();
    });

    it('should see records written by an earlier store on the same handle', () => {
      const db = new Database(':memory:');
      const first = new SqliteRecordStore({ database: db, codec: jsonCodec() });
      first.forceSet('k', { any: 'shape' });

      const second = new SqliteRecordStore({ database: db, codec: jsonCodec() });
      expect(second.get('k')).toEqual({ kind: 'found', key: 'k', payload: { any: 'shape' }, version: 1 });
      db.close();
    });

    it('should throw STORE_CLOSED after close', () => {
      const store = createStore();
      store.close();
      expect(() => store.get('acct:1')).toThrow('Record store is closed');
    });

    it('should raise PAYLOAD_INVALID for rows that fail the schema', () => {
      const db = new Database(':memory:');
      const loose = new SqliteRecordStore({ database: db, codec: jsonCodec() });
      loose.forceSet('acct:1', { balance: 'lots' });

      const strict = new SqliteRecordStore({ database: db, codec: jsonCodec(Account) });
      expect(() => strict.get('acct:1')).toThrow(/Stored payload for 'acct:1' does not match its schema/);
      db.close();
    });

    it('should wrap driver failures as STORE_IO', () => {
      const db = new Database(':memory:');
      const store = new SqliteRecordStore({ database: db, codec: jsonCodec(Account) });
      db.close();

      let caught: unknown;
      try {
        store.get('acct:1');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(StoreError);
      expect(caught instanceof StoreError && caught.code).toBe(StoreErrorCode.IO);
      expect(caught instanceof StoreError && caught.isRetryable()).toBe(true);
    });
  });
});
