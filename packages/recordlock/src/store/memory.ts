/**
 * In-memory record store
 *
 * Every operation completes within a single synchronous call, so no other
 * caller in the process can observe or interleave with a half-applied
 * write. Payloads are copied on the way in and on the way out; callers
 * never share an object with the store.
 */

import type {
  BatchResult,
  BatchWrite,
  CompareAndSetResult,
  GetResult,
  RecordStore,
  StoredRecord,
} from './types.js';
import { assertUniqueKeys, assertVersion } from './types.js';

export class MemoryRecordStore<T = unknown> implements RecordStore<T> {
  private readonly records = new Map<string, StoredRecord<T>>();

  constructor(seed?: Iterable<readonly [string, T]>) {
    if (seed) {
      for (const [key, payload] of seed) {
        this.forceSet(key, payload);
      }
    }
  }

  get(key: string): GetResult<T> {
    const record = this.records.get(key);
    if (!record) {
      return { kind: 'not_found', key };
    }
    return { kind: 'found', key, payload: structuredClone(record.payload), version: record.version };
  }

  compareAndSet(key: string, expectedVersion: number, payload: T): CompareAndSetResult {
    assertVersion(expectedVersion);
    const actual = this.versionOf(key);
    if (actual !== expectedVersion) {
      return { kind: 'version_mismatch', key, expected: expectedVersion, actual };
    }
    return { kind: 'success', key, version: this.put(key, payload, actual) };
  }

  forceSet(key: string, payload: T): number {
    return this.put(key, payload, this.versionOf(key));
  }

  applyBatch(writes: readonly BatchWrite<T>[]): BatchResult {
    assertUniqueKeys(writes);

    // validate everything before touching anything
    for (const write of writes) {
      if (write.kind !== 'cas') continue;
      assertVersion(write.expectedVersion);
      const actual = this.versionOf(write.key);
      if (actual !== write.expectedVersion) {
        return { kind: 'version_mismatch', key: write.key, expected: write.expectedVersion, actual };
      }
    }

    const versions = new Map<string, number>();
    for (const write of writes) {
      versions.set(write.key, this.put(write.key, write.payload, this.versionOf(write.key)));
    }
    return { kind: 'success', versions };
  }

  size(): number {
    return this.records.size;
  }

  keys(): string[] {
    return [...this.records.keys()].sort();
  }

  private versionOf(key: string): number {
    return this.records.get(key)?.version ?? 0;
  }

  private put(key: string, payload: T, current: number): number {
    const version = current + 1;
    this.records.set(key, { key, payload: structuredClone(payload), version });
    return version;
  }
}
