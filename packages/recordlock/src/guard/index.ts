/**
 * Version guard module
 *
 * @packageDocumentation
 */

export {
  createVersionGuard,
  type VersionGuard,
  type VersionGuardOptions,
  type VersionGuardStats,
  type ReadSnapshot,
} from './version-guard.js';
