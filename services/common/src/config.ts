import { z } from 'zod';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'n', 'off']);

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (normalized && TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (normalized && FALSE_VALUES.has(normalized)) {
    return false;
  }
  return defaultValue;
}

/** Blank or non-numeric values fall back to the default rather than NaN. */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value?.trim()) {
    return defaultValue;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function clamp(value: number, { min = Number.NEGATIVE_INFINITY, max = Number.POSITIVE_INFINITY }: { min?: number; max?: number }): number {
  return Math.min(max, Math.max(min, value));
}

/** Trailing slashes are dropped so paths can be appended with a leading `/`. */
export function normalizeUrl(value: string | undefined, fallback: string): string {
  return (value?.trim() || fallback).replace(/\/+$/, '');
}

const runtimeSchema = z.object({
  serviceName: z.string().min(1),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  env: z.string().min(1)
});

const redisSchema = z.object({
  host: z.string().min(1, 'REDIS_HOST must not be empty.'),
  port: z.number().int().min(1).max(65_535),
  password: z.string().optional(),
  tls: z.boolean(),
  tlsRejectUnauthorized: z.boolean(),
  caCert: z.string().optional()
});

const postgresSchema = z.object({
  host: z.string().min(1, 'PGHOST must not be empty.'),
  port: z.number().int().min(1).max(65_535),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().optional(),
  ssl: z.boolean(),
  poolMax: z.number().int().min(1, 'PGPOOL_MAX must be at least 1.').max(100),
  idleTimeoutMs: z.number().nonnegative(),
  connectionTimeoutMs: z.number().nonnegative(),
  statementTimeoutMs: z.number().nonnegative()
});

const serviceConfigSchema = z.object({
  runtime: runtimeSchema,
  redis: redisSchema,
  postgres: postgresSchema
});

export type RuntimeConfig = z.infer<typeof runtimeSchema>;
export type RedisConfig = z.infer<typeof redisSchema>;
export type PostgresConfig = z.infer<typeof postgresSchema>;
export type ServiceConfig = z.infer<typeof serviceConfigSchema>;

function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function fromEnvironment(): unknown {
  return {
    runtime: {
      serviceName: readEnv('SERVICE_NAME') ?? 'orgscout',
      logLevel: readEnv('LOG_LEVEL')?.toLowerCase() ?? 'info',
      env: readEnv('NODE_ENV') ?? 'development'
    },
    redis: {
      host: process.env.REDIS_HOST?.trim() ?? 'localhost',
      port: parseNumber(process.env.REDIS_PORT, 6379),
      password: readEnv('REDIS_PASSWORD'),
      tls: parseBoolean(process.env.REDIS_TLS, false),
      tlsRejectUnauthorized: parseBoolean(process.env.REDIS_TLS_REJECT_UNAUTHORIZED, true),
      caCert: readEnv('REDIS_TLS_CA')
    },
    postgres: {
      host: process.env.PGHOST?.trim() ?? 'localhost',
      port: parseNumber(process.env.PGPORT, 5432),
      database: readEnv('PGDATABASE') ?? 'orgscout',
      user: readEnv('PGUSER') ?? 'postgres',
      password: readEnv('PGPASSWORD'),
      ssl: parseBoolean(process.env.PGSSL, false),
      poolMax: parseNumber(process.env.PGPOOL_MAX, 10),
      idleTimeoutMs: parseNumber(process.env.PG_IDLE_TIMEOUT_MS, 30_000),
      connectionTimeoutMs: parseNumber(process.env.PG_CONNECTION_TIMEOUT_MS, 5_000),
      statementTimeoutMs: parseNumber(process.env.PG_STATEMENT_TIMEOUT_MS, 15_000)
    }
  };
}

let cachedConfig: ServiceConfig | null = null;

/** Reads and validates the shared runtime, Redis and Postgres settings once per process. */
export function getConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = serviceConfigSchema.safeParse(fromEnvironment());
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid service configuration: ${problems.join('; ')}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
