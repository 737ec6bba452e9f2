/**
 * Record store module
 *
 * @packageDocumentation
 */

export type {
  StoredRecord,
  GetResult,
  CompareAndSetResult,
  CasWrite,
  ForceWrite,
  BatchWrite,
  BatchResult,
  RecordStore,
} from './types.js';
export { assertVersion, assertUniqueKeys } from './types.js';
export { MemoryRecordStore } from './memory.js';
export { SqliteRecordStore, type SqliteRecordStoreOptions } from './sqlite.js';
export { jsonCodec, type PayloadCodec } from './codec.js';
