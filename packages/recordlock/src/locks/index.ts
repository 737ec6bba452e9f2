/**
 * Lock module
 *
 * @packageDocumentation
 */

export {
  createLockTable,
  type LockTable,
  type LockTableOptions,
  type LockTableStats,
  type LockEntry,
  type AcquireOptions,
  type AcquireResult,
  type Acquired,
  type Released,
  type ReleaseResult,
  type SweepResult,
} from './lock-table.js';
export { WaitForGraph } from './wait-for-graph.js';
