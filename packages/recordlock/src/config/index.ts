/**
 * recordlock Configuration
 *
 * Zod schema for the settings recognized by the layer, with defaults and
 * an environment variable reader.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

/**
 * Longest delay a Node.js timer honours; larger ones fire after 1ms
 */
export const MAX_TIMER_MS = 2_147_483_647;

const durationMs = z.number().int().nonnegative().max(MAX_TIMER_MS);

/**
 * Configuration schema
 */
export const RecordLockConfigSchema = z.object({
  /** Default wait before an acquire returns LockTimeout */
  lockTimeoutMs: durationMs.default(5000),
  /** Retry ceiling for version mismatches before GiveUp */
  maxOptimisticRetries: z.number().int().nonnegative().default(3),
  /** First retry delay */
  backoffBaseMs: durationMs.default(50),
  /** Upper bound of the random delay added to each retry */
  backoffJitterMs: durationMs.default(25),
  /** Retry delay cap (before jitter) */
  backoffMaxMs: durationMs.default(2000),
  /** Auto rollback of contexts older than this, 0 disables */
  transactionTimeoutMs: durationMs.default(30000),
  /** Waiters per key before acquire answers LockHeldByOther */
  maxWaitQueueSize: z.number().int().positive().default(100),
  /** Refuse waits that close a cycle in the wait-for graph */
  detectDeadlocks: z.boolean().default(false),
  /** Lock age after which sweep() evicts it, 0 disables */
  lockLeaseMs: durationMs.default(0),
});

/**
 * Fully resolved configuration
 */
export type RecordLockConfig = z.infer<typeof RecordLockConfigSchema>;

/**
 * Configuration accepted from callers; omitted fields take defaults
 */
export type RecordLockConfigInput = z.input<typeof RecordLockConfigSchema>;

/**
 * Defaults for every field
 */
export const DEFAULT_CONFIG: RecordLockConfig = RecordLockConfigSchema.parse({});

/**
 * Validate a partial configuration and fill in defaults
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(input: unknown = {}): RecordLockConfig {
  const result = RecordLockConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Validate a per-call timeout that does not pass through the schema.
 * Accepts 0 to MAX_TIMER_MS, or Infinity for no timer.
 * @throws RangeError otherwise, NaN included
 */
export function assertTimeoutMs(name: string, value: number): void {
  if (value === Infinity) return;
  if (!(value >= 0 && value <= MAX_TIMER_MS)) {
    throw new RangeError(`Invalid ${name} ${value}: expected 0 to ${MAX_TIMER_MS} ms or Infinity`);
  }
}

/**
 * Environment variable names per config field
 */
export const CONFIG_ENV_VARS = {
  lockTimeoutMs: 'RECORDLOCK_LOCK_TIMEOUT_MS',
  maxOptimisticRetries: 'RECORDLOCK_MAX_OPTIMISTIC_RETRIES',
  backoffBaseMs: 'RECORDLOCK_BACKOFF_BASE_MS',
  backoffJitterMs: 'RECORDLOCK_BACKOFF_JITTER_MS',
  backoffMaxMs: 'RECORDLOCK_BACKOFF_MAX_MS',
  transactionTimeoutMs: 'RECORDLOCK_TRANSACTION_TIMEOUT_MS',
  maxWaitQueueSize: 'RECORDLOCK_MAX_WAIT_QUEUE_SIZE',
  detectDeadlocks: 'RECORDLOCK_DETECT_DEADLOCKS',
  lockLeaseMs: 'RECORDLOCK_LOCK_LEASE_MS',
} as const satisfies Record<keyof RecordLockConfig, string>;

const envNumber = z.coerce.number();
const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((v) => v === 'true' || v === '1');

/**
 * Read configuration from environment variables. Unset variables take
 * defaults; `overrides` win over the environment.
 *
 * @example
 * ```typescript
 * const config = configFromEnv(process.env, { transactionTimeoutMs: 0 });
 * ```
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RecordLockConfigInput = {}
): RecordLockConfig {
  const raw: Record<string, unknown> = {};
  const issues: string[] = [];

  for (const [field, name] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[name];
    if (value === undefined || value.trim() === '') {
      continue;
    }
    const parsed = field === 'detectDeadlocks' ? envBoolean.safeParse(value) : envNumber.safeParse(value);
    if (parsed.success) {
      raw[field] = parsed.data;
    } else {
      issues.push(`${name}: cannot parse '${value}'`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return parseConfig({ ...raw, ...overrides });
}
