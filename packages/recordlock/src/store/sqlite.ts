/**
 * SQLite record store
 *
 * Persists records in one table `(key, payload, version)` through
 * better-sqlite3. Every mutation is a single statement or runs inside an
 * IMMEDIATE transaction, so separate processes sharing the database file
 * serialize on SQLite's write lock instead of racing between a read and
 * a write.
 *
 * @example
 * ```typescript
 * const store = new SqliteRecordStore({
 *   database: './records.sqlite',
 *   codec: jsonCodec(AccountSchema),
 *   journalMode: 'wal',
 * });
 * store.forceSet('acct:1', { balance: 100 }); // version 1
 * ```
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import { StoreError, StoreErrorCode } from '../errors/index.js';
import type { PayloadCodec } from './codec.js';
import type {
  BatchResult,
  BatchWrite,
  CompareAndSetResult,
  GetResult,
  RecordStore,
} from './types.js';
import { assertUniqueKeys, assertVersion } from './types.js';

/**
 * Options for the SQLite store
 */
export interface SqliteRecordStoreOptions<T> {
  /** Open database handle, or a file path (':memory:' for a private in-memory database) */
  database: Database.Database | string;
  /** Payload codec */
  codec: PayloadCodec<T>;
  /** Table name (default: records) */
  table?: string;
  /** Journal mode applied when the store opens the file itself */
  journalMode?: 'wal' | 'delete';
  /** busy_timeout in ms applied when the store opens the file itself */
  busyTimeoutMs?: number;
}

interface RecordRow {
  payload: string;
  version: number;
}

interface VersionRow {
  version: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class SqliteRecordStore<T> implements RecordStore<T> {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly codec: PayloadCodec<T>;
  private closed = false;

  private readonly selectRecord: Database.Statement<[string], RecordRow>;
  private readonly selectVersion: Database.Statement<[string], VersionRow>;
  private readonly insertNew: Database.Statement<[string, string]>;
  private readonly updateIfVersion: Database.Statement<[string, string, number]>;
  private readonly upsert: Database.Statement<[string, string], VersionRow>;
  private readonly countRows: Database.Statement<[], { n: number }>;
  private readonly selectKeys: Database.Statement<[], { key: string }>;

  private readonly casTxn: (key: string, expectedVersion: number, text: string) => CompareAndSetResult;
  private readonly batchTxn: (writes: readonly BatchWrite<T>[]) => BatchResult;

  constructor(options: SqliteRecordStoreOptions<T>) {
    const table = options.table ?? 'records';
    if (!IDENTIFIER.test(table)) {
      throw new StoreError(StoreErrorCode.INVALID_TABLE, `Invalid table name '${table}'`);
    }

    this.codec = options.codec;

    if (typeof options.database === 'string') {
      this.db = new Database(options.database);
      this.ownsDatabase = true;
      if (options.journalMode) {
        this.db.pragma(`journal_mode = ${options.journalMode.toUpperCase()}`);
      }
      if (options.busyTimeoutMs !== undefined) {
        this.db.pragma(`busy_timeout = ${Math.floor(options.busyTimeoutMs)}`);
      }
    } else {
      this.db = options.database;
      this.ownsDatabase = false;
    }

    this.db.exec(
      `CREATE TABLE IF NOT EXISTS ${table} (
        key TEXT PRIMARY KEY NOT NULL,
        payload TEXT NOT NULL,
        version INTEGER NOT NULL CHECK (version > 0)
      )`
    );

    this.selectRecord = this.db.prepare<[string], RecordRow>(
      `SELECT payload, version FROM ${table} WHERE key = ?`
    );
    this.selectVersion = this.db.prepare<[string], VersionRow>(
      `SELECT version FROM ${table} WHERE key = ?`
    );
    this.insertNew = this.db.prepare<[string, string]>(
      `INSERT INTO ${table} (key, payload, version) VALUES (?, ?, 1) ON CONFLICT(key) DO NOTHING`
    );
    this.updateIfVersion = this.db.prepare<[string, string, number]>(
      `UPDATE ${table} SET payload = ?, version = version + 1 WHERE key = ? AND version = ?`
    );
    this.upsert = this.db.prepare<[string, string], VersionRow>(
      `INSERT INTO ${table} (key, payload, version) VALUES (?, ?, 1)
       ON CONFLICT(key) DO UPDATE SET payload = excluded.payload, version = ${table}.version + 1
       RETURNING version`
    );
    this.countRows = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`);
    this.selectKeys = this.db.prepare<[], { key: string }>(`SELECT key FROM ${table} ORDER BY key`);

    const cas = this.db.transaction((key: string, expectedVersion: number, text: string): CompareAndSetResult => {
      const changes =
        expectedVersion === 0
          ? this.insertNew.run(key, text).changes
          : this.updateIfVersion.run(text, key, expectedVersion).changes;
      if (changes === 1) {
        return { kind: 'success', key, version: expectedVersion + 1 };
      }
      return { kind: 'version_mismatch', key, expected: expectedVersion, actual: this.currentVersion(key) };
    });
    this.casTxn = (key, expectedVersion, text) => cas.immediate(key, expectedVersion, text);

    const batch = this.db.transaction((writes: readonly BatchWrite<T>[]): BatchResult => {
      for (const write of writes) {
        if (write.kind !== 'cas') continue;
        const actual = this.currentVersion(write.key);
        if (actual !== write.expectedVersion) {
          return { kind: 'version_mismatch', key: write.key, expected: write.expectedVersion, actual };
        }
      }

      const versions = new Map<string, number>();
      for (const write of writes) {
        versions.set(write.key, this.writeUnconditionally(write.key, this.codec.encode(write.payload)));
      }
      return { kind: 'success', versions };
    });
    this.batchTxn = (writes) => batch.immediate(writes);
  }

  get(key: string): GetResult<T> {
    return this.guard(() => {
      const row = this.selectRecord.get(key);
      if (!row) {
        return { kind: 'not_found', key };
      }
      return { kind: 'found', key, payload: this.codec.decode(row.payload, key), version: row.version };
    });
  }

  compareAndSet(key: string, expectedVersion: number, payload: T): CompareAndSetResult {
    assertVersion(expectedVersion);
    const text = this.codec.encode(payload);
    return this.guard(() => this.casTxn(key, expectedVersion, text));
  }

  forceSet(key: string, payload: T): number {
    const text = this.codec.encode(payload);
    return this.guard(() => this.writeUnconditionally(key, text));
  }

  applyBatch(writes: readonly BatchWrite<T>[]): BatchResult {
    assertUniqueKeys(writes);
    for (const write of writes) {
      if (write.kind === 'cas') assertVersion(write.expectedVersion);
    }
    return this.guard(() => this.batchTxn(writes));
  }

  size(): number {
    return this.guard(() => this.countRows.get()?.n ?? 0);
  }

  keys(): string[] {
    return this.guard(() => this.selectKeys.all().map((row) => row.key));
  }

  /**
   * Close the database if this store opened it
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDatabase) {
      this.db.close();
    }
  }

  private currentVersion(key: string): number {
    return this.selectVersion.get(key)?.version ?? 0;
  }

  private writeUnconditionally(key: string, text: string): number {
    const row = this.upsert.get(key, text);
    if (!row) {
      throw new StoreError(StoreErrorCode.IO, `Upsert of '${key}' returned no version`, { context: { key } });
    }
    return row.version;
  }

  /**
   * Run a database call, mapping driver failures to StoreError(IO)
   */
  private guard<R>(fn: () => R): R {
    if (this.closed) {
      throw new StoreError(StoreErrorCode.CLOSED, 'Record store is closed');
    }
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError || error instanceof RangeError) {
        throw error;
      }
      throw new StoreError(StoreErrorCode.IO, 'SQLite operation failed', { cause: error });
    }
  }
}
