import { Pool, type PoolConfig } from 'pg';

import { getConfig, type PostgresConfig } from './config.js';
import { getLogger } from './logger.js';

export function buildPoolConfig(config: PostgresConfig): PoolConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    statement_timeout: config.statementTimeoutMs
  };
}

export function createPgPool(config: PostgresConfig = getConfig().postgres): Pool {
  const logger = getLogger({ module: 'postgres' });
  const pool = new Pool(buildPoolConfig(config));

  pool.on('error', (error) => {
    logger.error({ error }, 'Idle Postgres client encountered an error.');
  });

  logger.info({ host: config.host, port: config.port, database: config.database, poolMax: config.poolMax }, 'Postgres pool created.');

  return pool;
}
