import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { clamp, getConfig, normalizeUrl, parseBoolean, parseNumber, resetConfigForTesting } from '../config.js';
import { resetLoggerForTesting } from '../logger.js';
import { reconnectDelay } from '../redis.js';

describe('environment parsing helpers', () => {
  it('parses booleans leniently and falls back on unknown words', () => {
    expect(parseBoolean(' YES ', false)).toBe(true);
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });

  it('falls back on blank or non-numeric numbers', () => {
    expect(parseNumber('42', 1)).toBe(42);
    expect(parseNumber('  ', 7)).toBe(7);
    expect(parseNumber('ten', 7)).toBe(7);
  });

  it('clamps and normalizes', () => {
    expect(clamp(500, { min: 1, max: 100 })).toBe(100);
    expect(clamp(-3, { min: 0 })).toBe(0);
    expect(normalizeUrl('https://api.test/v2//', 'https://fallback.test')).toBe('https://api.test/v2');
    expect(normalizeUrl('  ', 'https://fallback.test/')).toBe('https://fallback.test');
  });
});

describe('getConfig', () => {
  beforeEach(() => {
    resetConfigForTesting();
    resetLoggerForTesting();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfigForTesting();
    resetLoggerForTesting();
  });

  it('builds defaults and caches the result', () => {
    vi.stubEnv('PGPASSWORD', '');
    const config = getConfig();

    expect(config.redis).toMatchObject({ host: 'localhost', port: 6379, tls: false });
    expect(config.postgres).toMatchObject({ database: 'orgscout', poolMax: 10, statementTimeoutMs: 15_000 });
    expect(config.postgres.password).toBeUndefined();
    expect(getConfig()).toBe(config);
  });

  it('rejects settings that cannot work', () => {
    vi.stubEnv('PGPOOL_MAX', '0');
    vi.stubEnv('REDIS_HOST', '');

    expect(() => getConfig()).toThrow(
      'Invalid service configuration: redis.host: REDIS_HOST must not be empty.; postgres.poolMax: PGPOOL_MAX must be at least 1.'
    );
  });

  it('rejects unknown log levels', () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    expect(() => getConfig()).toThrow(/runtime\.logLevel/);
  });
});

describe('reconnectDelay', () => {
  it('doubles from 200 ms up to the cap and then gives up', () => {
    expect([1, 2, 4, 5, 10].map(reconnectDelay)).toEqual([200, 400, 1_600, 3_000, 3_000]);
    expect(reconnectDelay(11)).toBeNull();
  });
});
