/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import {
  CONFIG_ENV_VARS,
  DEFAULT_CONFIG,
  MAX_TIMER_MS,
  assertTimeoutMs,
  configFromEnv,
  parseConfig,
} from '../index.js';

describe('parseConfig', () => {
  it('should fill in every default', () => {
    expect(parseConfig()).toEqual({
      lockTimeoutMs: 5000,
      maxOptimisticRetries: 3,
      backoffBaseMs: 50,
      backoffJitterMs: 25,
      backoffMaxMs: 2000,
      transactionTimeoutMs: 30000,
      maxWaitQueueSize: 100,
      detectDeadlocks: false,
      lockLeaseMs: 0,
    });
    expect(DEFAULT_CONFIG).toEqual(parseConfig({}));
  });

  it('should keep supplied values', () => {
    const config = parseConfig({ lockTimeoutMs: 200, detectDeadlocks: true });
    expect(config.lockTimeoutMs).toBe(200);
    expect(config.detectDeadlocks).toBe(true);
    expect(config.maxOptimisticRetries).toBe(3);
  });

  it('should list every invalid field', () => {
    let caught: unknown;
    try {
      parseConfig({ lockTimeoutMs: -1, maxWaitQueueSize: 0, backoffBaseMs: 1.5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('CONFIG_INVALID');
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues[0]).toMatch(/^lockTimeoutMs: /);
      expect(caught.issues.some((issue) => issue.startsWith('backoffBaseMs: '))).toBe(true);
      expect(caught.issues.some((issue) => issue.startsWith('maxWaitQueueSize: '))).toBe(true);
      expect(caught.message).toMatch(/^Invalid recordlock configuration: lockTimeoutMs: /);
    }
  });

  it('should reject durations a timer cannot honour', () => {
    expect(parseConfig({ transactionTimeoutMs: MAX_TIMER_MS }).transactionTimeoutMs).toBe(2_147_483_647);
    expect(() => parseConfig({ transactionTimeoutMs: 2 ** 31 })).toThrow(/^Invalid recordlock configuration: transactionTimeoutMs: /);
    expect(() => parseConfig({ lockTimeoutMs: 2 ** 31 })).toThrow(ConfigError);
  });

  it('should reject a non-object', () => {
    expect(() => parseConfig('fast')).toThrow(ConfigError);
  });
});

describe('configFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    expect(configFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read numbers and booleans', () => {
    const config = configFromEnv({
      RECORDLOCK_LOCK_TIMEOUT_MS: '250',
      RECORDLOCK_MAX_OPTIMISTIC_RETRIES: '5',
      RECORDLOCK_DETECT_DEADLOCKS: 'TRUE',
      RECORDLOCK_LOCK_LEASE_MS: ' ',
    });
    expect(config.lockTimeoutMs).toBe(250);
    expect(config.maxOptimisticRetries).toBe(5);
    expect(config.detectDeadlocks).toBe(true);
    expect(config.lockLeaseMs).toBe(0);
  });

  it('should accept 0 and 1 for booleans', () => {
    expect(configFromEnv({ RECORDLOCK_DETECT_DEADLOCKS: '1' }).detectDeadlocks).toBe(true);
    expect(configFromEnv({ RECORDLOCK_DETECT_DEADLOCKS: '0' }).detectDeadlocks).toBe(false);
  });

  it('should let overrides win over the environment', () => {
    const config = configFromEnv({ RECORDLOCK_TRANSACTION_TIMEOUT_MS: '1000' }, { transactionTimeoutMs: 0 });
    expect(config.transactionTimeoutMs).toBe(0);
  });

  it('should name unparsable variables', () => {
    expect(() =>
      configFromEnv({ RECORDLOCK_BACKOFF_BASE_MS: 'soon', RECORDLOCK_DETECT_DEADLOCKS: 'maybe' })
    ).toThrow(
      "Invalid recordlock configuration: RECORDLOCK_BACKOFF_BASE_MS: cannot parse 'soon'; RECORDLOCK_DETECT_DEADLOCKS: cannot parse 'maybe'"
    );
  });

  it('should validate parsed numbers against the schema', () => {
    expect(() => configFromEnv({ RECORDLOCK_MAX_WAIT_QUEUE_SIZE: '0' })).toThrow(/maxWaitQueueSize/);
  });

  it('should map every field to a RECORDLOCK_ variable', () => {
    expect(Object.keys(CONFIG_ENV_VARS).sort()).toEqual(Object.keys(DEFAULT_CONFIG).sort());
    expect(Object.values(CONFIG_ENV_VARS).every((name) => name.startsWith('RECORDLOCK_'))).toBe(true);
  });
});

describe('assertTimeoutMs', () => {
  it('should accept 0 through MAX_TIMER_MS and Infinity', () => {
    expect(() => assertTimeoutMs('lock timeout', 0)).not.toThrow();
    expect(() => assertTimeoutMs('lock timeout', MAX_TIMER_MS)).not.toThrow();
    expect(() => assertTimeoutMs('lock timeout', Infinity)).not.toThrow();
  });

  it('should reject NaN, negatives and values past the timer limit', () => {
    expect(() => assertTimeoutMs('lock timeout', NaN)).toThrow(
      'Invalid lock timeout NaN: expected 0 to 2147483647 ms or Infinity'
    );
    expect(() => assertTimeoutMs('lock timeout', -1)).toThrow(RangeError);
    expect(() => assertTimeoutMs('transaction timeout', 2 ** 31)).toThrow(
      'Invalid transaction timeout 2147483648: expected 0 to 2147483647 ms or Infinity'
    );
  });
});
