import { Redis, type RedisOptions } from 'ioredis';

import { getConfig, type RedisConfig } from './config.js';
import { getLogger, type Logger } from './logger.js';

const MAX_RECONNECT_ATTEMPTS = 10;
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'ECONNREFUSED']);

/** Reconnect delay for attempt `n` (100 ms doubling, capped at 3 s), or null to give up. */
export function reconnectDelay(attempt: number): number | null {
  if (attempt > MAX_RECONNECT_ATTEMPTS) {
    return null;
  }
  return Math.min(100 * 2 ** attempt, 3_000);
}

export function buildRedisOptions(config: RedisConfig, logger: Logger): RedisOptions {
  return {
    host: config.host,
    port: config.port,
    password: config.password,
    tls: config.tls ? { rejectUnauthorized: config.tlsRejectUnauthorized, ca: config.caCert ? [config.caCert] : undefined } : undefined,
    lazyConnect: true,
    keepAlive: 5_000,
    retryStrategy: (attempt: number) => {
      const delay = reconnectDelay(attempt);
      if (delay === null) {
        logger.error({ attempt }, 'Giving up on Redis after repeated reconnect failures.');
      } else {
        logger.info({ attempt, delay }, 'Reconnecting to Redis.');
      }
      return delay;
    }
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

let shared: Redis | null = null;
let pending: Promise<Redis> | null = null;

/**
 * Process-wide client for the session store. Concurrent callers share one
 * connection attempt; a lost connection drops the cached client so the next
 * caller reconnects.
 */
export async function getRedisClient(config: RedisConfig = getConfig().redis): Promise<Redis> {
  if (shared?.status === 'ready') {
    return shared;
  }
  if (pending) {
    return pending;
  }

  const logger = getLogger({ module: 'redis' });
  const client = new Redis(buildRedisOptions(config, logger));
  client.on('error', (error: unknown) => {
    logger.error({ error }, 'Redis client error.');
    const code = errorCode(error);
    if (code && CONNECTION_LOST_CODES.has(code) && shared === client) {
      shared = null;
    }
  });
  client.on('ready', () => logger.info({ host: config.host, port: config.port, tls: config.tls }, 'Redis connection ready.'));

  pending = client
    .connect()
    .then(() => {
      shared = client;
      return client;
    })
    .finally(() => {
      pending = null;
    });
  return pending;
}

export async function closeRedisClient(): Promise<void> {
  if (pending) {
    await pending.catch((error: unknown) => {
      getLogger({ module: 'redis' }).warn({ error }, 'Redis connection failed before close.');
    });
  }
  const client = shared;
  shared = null;
  if (client?.status === 'ready') {
    await client.quit();
  }
}
