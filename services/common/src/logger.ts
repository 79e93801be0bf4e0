import pino, { type Logger } from 'pino';

import { getConfig } from './config.js';

export type { Logger } from 'pino';

/** One billable call to an external provider. */
export interface CostMetricEntry {
  api_name: string;
  provider: string;
  cost_cents: number;
  cost_category?: string;
  run_id?: string;
  metadata?: Record<string, unknown>;
}

const REDACTED_PATHS = [
  'apiKey',
  '*.apiKey',
  'config.headers.apikey',
  'config.headers.Authorization',
  'err.config.headers.apikey',
  'err.config.headers.Authorization',
  'error.config.headers.apikey',
  'error.config.headers.Authorization'
];

let rootLogger: Logger | null = null;
let costLogger: Logger | null = null;

function rootFromConfig(): Logger {
  if (rootLogger) {
    return rootLogger;
  }

  const { runtime } = getConfig();
  rootLogger = pino({
    level: runtime.logLevel,
    base: { service: runtime.serviceName, env: runtime.env },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    // components log failures under both keys
    serializers: { err: pino.stdSerializers.err, error: pino.stdSerializers.err }
  });
  return rootLogger;
}

/** Child of the process logger; components pass `{ module }` and sometimes `runId`. */
export function getLogger(bindings?: Record<string, unknown>): Logger {
  const root = rootFromConfig();
  return bindings ? root.child(bindings) : root;
}

/**
 * Cost lines go to their own `cost_metrics` stream so they can be summed per
 * provider or per run downstream. Zero-cost calls are not reported.
 */
export function emitCostMetric(entry: CostMetricEntry): void {
  if (!(entry.cost_cents > 0)) {
    return;
  }

  costLogger ??= rootFromConfig().child({ stream: 'cost_metrics' });
  costLogger.info(
    {
      logType: 'cost_metric',
      api_name: entry.api_name,
      provider: entry.provider,
      cost_category: entry.cost_category,
      cost_cents: Number(entry.cost_cents.toFixed(4)),
      cost_usd: Number((entry.cost_cents / 100).toFixed(6)),
      run_id: entry.run_id,
      metadata: entry.metadata
    },
    'External call cost recorded.'
  );
}

export function resetLoggerForTesting(): void {
  rootLogger = null;
  costLogger = null;
}
