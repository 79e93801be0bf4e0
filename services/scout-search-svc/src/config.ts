import { clamp, getConfig as getBaseConfig, normalizeUrl, parseBoolean, parseNumber, type ServiceConfig } from '@orgscout/common';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SearchBackendConfig {
  baseUrl: string;
  apiKey: string;
  companyEndpoint: string;
  personEndpoint: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  minIntervalMs: number;
  pageSize: number;
  maxPages: number;
}

export interface TextSearchConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey: string;
  searchDepth: 'basic' | 'advanced';
  resultsPerQuery: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  minIntervalMs: number;
}

export interface ClassifierConfig {
  enabled: boolean;
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  batchSize: number;
  scoreMin: number;
  scoreMax: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
}

export interface EntityCacheConfig {
  lookupTtlMs: number;
  negativeTtlMs: number;
  profileTtlMs: number;
  cacheFailedLookups: boolean;
  minConfidence: number;
  schema: string;
  lookupTable: string;
  profileTable: string;
  enableAutoMigrate: boolean;
}

export interface SessionConfig {
  ttlHours: number;
  keyPrefix: string;
  pageCacheTtlSeconds: number;
  disablePageCache: boolean;
}

export interface DiscoveryConfig {
  maxSeeds: number;
  maxKeywordQueries: number;
  strategyConcurrency: number;
  resolutionConcurrency: number;
  maxCandidates: number;
}

export interface QueryCompilerConfig {
  chunkSize: number;
  nestedPath: string;
  idField: string;
  titleField: string;
  locationField: string;
}

export interface PipelineConfig {
  runTimeoutMs: number;
  selectionLimit: number;
  minRelevanceScore: number;
  /** Selected organizations per person-search batch; each batch gets its own page budget. */
  searchBatchSize: number;
}

export interface SearchServiceConfig {
  base: ServiceConfig;
  backend: SearchBackendConfig;
  textSearch: TextSearchConfig;
  classifier: ClassifierConfig;
  cache: EntityCacheConfig;
  sessions: SessionConfig;
  discovery: DiscoveryConfig;
  compiler: QueryCompilerConfig;
  pipeline: PipelineConfig;
}

let cachedConfig: SearchServiceConfig | null = null;

function requireKey(name: string, value: string | undefined, enabled: boolean): string {
  const trimmed = (value ?? '').trim();
  if (enabled && trimmed.length === 0) {
    throw new Error(`${name} must be set.`);
  }
  return trimmed;
}

function parseSearchDepth(value: string | undefined): 'basic' | 'advanced' {
  return value?.trim().toLowerCase() === 'advanced' ? 'advanced' : 'basic';
}

export function getSearchServiceConfig(): SearchServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const backend: SearchBackendConfig = {
    baseUrl: normalizeUrl(process.env.SEARCH_BACKEND_BASE_URL, 'https://api.search-backend.example'),
    apiKey: requireKey('SEARCH_BACKEND_API_KEY', process.env.SEARCH_BACKEND_API_KEY, true),
    companyEndpoint: process.env.SEARCH_BACKEND_COMPANY_ENDPOINT ?? 'company',
    personEndpoint: process.env.SEARCH_BACKEND_PERSON_ENDPOINT ?? 'employee',
    timeoutMs: Math.max(1, parseNumber(process.env.SEARCH_BACKEND_TIMEOUT_MS, 10_000)),
    retries: Math.max(0, parseNumber(process.env.SEARCH_BACKEND_RETRIES, 3)),
    retryDelayMs: Math.max(0, parseNumber(process.env.SEARCH_BACKEND_RETRY_DELAY_MS, 500)),
    minIntervalMs: Math.max(0, parseNumber(process.env.SEARCH_BACKEND_MIN_INTERVAL_MS, 4_000)),
    pageSize: clamp(parseNumber(process.env.SEARCH_PAGE_SIZE, 20), { min: 1, max: 100 }),
    maxPages: clamp(parseNumber(process.env.SEARCH_MAX_PAGES, 5), { min: 1, max: 100 })
  };

  const textSearchEnabled = parseBoolean(process.env.TEXT_SEARCH_ENABLED, true);
  const textSearch: TextSearchConfig = {
    enabled: textSearchEnabled,
    baseUrl: normalizeUrl(process.env.TEXT_SEARCH_BASE_URL, 'https://api.text-search.example'),
    apiKey: requireKey('TEXT_SEARCH_API_KEY', process.env.TEXT_SEARCH_API_KEY, textSearchEnabled),
    searchDepth: parseSearchDepth(process.env.TEXT_SEARCH_DEPTH),
    resultsPerQuery: clamp(parseNumber(process.env.TEXT_SEARCH_RESULTS_PER_QUERY, 10), { min: 1, max: 20 }),
    timeoutMs: Math.max(1, parseNumber(process.env.TEXT_SEARCH_TIMEOUT_MS, 10_000)),
    retries: Math.max(0, parseNumber(process.env.TEXT_SEARCH_RETRIES, 2)),
    retryDelayMs: Math.max(0, parseNumber(process.env.TEXT_SEARCH_RETRY_DELAY_MS, 500)),
    minIntervalMs: Math.max(0, parseNumber(process.env.TEXT_SEARCH_MIN_INTERVAL_MS, 250))
  };

  const classifierEnabled = parseBoolean(process.env.CLASSIFIER_ENABLED, true);
  const scoreMin = parseNumber(process.env.CLASSIFIER_SCORE_MIN, 1);
  const classifier: ClassifierConfig = {
    enabled: classifierEnabled,
    baseUrl: normalizeUrl(process.env.CLASSIFIER_BASE_URL, 'https://api.openai.com/v1'),
    apiKey: requireKey('CLASSIFIER_API_KEY', process.env.CLASSIFIER_API_KEY, classifierEnabled),
    model: process.env.CLASSIFIER_MODEL ?? 'gpt-4o-mini',
    timeoutMs: Math.max(1, parseNumber(process.env.CLASSIFIER_TIMEOUT_MS, 10_000)),
    retries: Math.max(0, parseNumber(process.env.CLASSIFIER_RETRIES, 2)),
    retryDelayMs: Math.max(0, parseNumber(process.env.CLASSIFIER_RETRY_DELAY_MS, 500)),
    batchSize: clamp(parseNumber(process.env.CLASSIFIER_BATCH_SIZE, 20), { min: 1, max: 100 }),
    scoreMin,
    scoreMax: Math.max(scoreMin + 1, parseNumber(process.env.CLASSIFIER_SCORE_MAX, 10)),
    circuitBreakerFailures: Math.max(1, parseNumber(process.env.CLASSIFIER_CB_FAILURES, 3)),
    circuitBreakerCooldownMs: Math.max(0, parseNumber(process.env.CLASSIFIER_CB_COOLDOWN_MS, 30_000))
  };

  const cache: EntityCacheConfig = {
    lookupTtlMs: Math.max(0, parseNumber(process.env.ENTITY_CACHE_LOOKUP_TTL_DAYS, 180)) * DAY_MS,
    negativeTtlMs: Math.max(0, parseNumber(process.env.ENTITY_CACHE_NEGATIVE_TTL_DAYS, 7)) * DAY_MS,
    profileTtlMs: Math.max(0, parseNumber(process.env.ENTITY_CACHE_PROFILE_TTL_DAYS, 90)) * DAY_MS,
    cacheFailedLookups: parseBoolean(process.env.ENTITY_CACHE_FAILED_LOOKUPS, true),
    minConfidence: clamp(parseNumber(process.env.ENTITY_CACHE_MIN_CONFIDENCE, 0.8), { min: 0, max: 1 }),
    schema: process.env.ENTITY_CACHE_SCHEMA ?? 'public',
    lookupTable: process.env.ENTITY_CACHE_LOOKUP_TABLE ?? 'entity_lookup_cache',
    profileTable: process.env.ENTITY_CACHE_PROFILE_TABLE ?? 'entity_profile_cache',
    enableAutoMigrate: parseBoolean(process.env.ENTITY_CACHE_AUTO_MIGRATE, false)
  };

  const ttlHours = Math.max(1, parseNumber(process.env.SEARCH_SESSION_TTL_HOURS, 24));
  const sessions: SessionConfig = {
    ttlHours,
    keyPrefix: process.env.SEARCH_SESSION_KEY_PREFIX ?? 'orgscout:session',
    pageCacheTtlSeconds: Math.max(1, parseNumber(process.env.SEARCH_SESSION_PAGE_CACHE_TTL_SECONDS, ttlHours * 3600)),
    disablePageCache: parseBoolean(process.env.SEARCH_SESSION_DISABLE_PAGE_CACHE, false)
  };

  const discovery: DiscoveryConfig = {
    maxSeeds: Math.max(0, parseNumber(process.env.DISCOVERY_MAX_SEEDS, 3)),
    maxKeywordQueries: Math.max(0, parseNumber(process.env.DISCOVERY_MAX_KEYWORD_QUERIES, 4)),
    strategyConcurrency: Math.max(1, parseNumber(process.env.DISCOVERY_STRATEGY_CONCURRENCY, 4)),
    resolutionConcurrency: Math.max(1, parseNumber(process.env.DISCOVERY_RESOLUTION_CONCURRENCY, 8)),
    maxCandidates: Math.max(1, parseNumber(process.env.DISCOVERY_MAX_CANDIDATES, 150))
  };

  const compiler: QueryCompilerConfig = {
    chunkSize: Math.max(1, parseNumber(process.env.QUERY_CHUNK_SIZE, 50)),
    nestedPath: process.env.QUERY_NESTED_PATH ?? 'experience',
    idField: process.env.QUERY_ID_FIELD ?? 'experience.company_id',
    titleField: process.env.QUERY_TITLE_FIELD ?? 'experience.title',
    locationField: process.env.QUERY_LOCATION_FIELD ?? 'location'
  };

  const pipeline: PipelineConfig = {
    runTimeoutMs: Math.max(0, parseNumber(process.env.PIPELINE_RUN_TIMEOUT_MS, 120_000)),
    selectionLimit: Math.max(1, parseNumber(process.env.PIPELINE_SELECTION_LIMIT, 50)),
    minRelevanceScore: parseNumber(process.env.PIPELINE_MIN_RELEVANCE_SCORE, 5),
    searchBatchSize: Math.max(1, parseNumber(process.env.PIPELINE_SEARCH_BATCH_SIZE, 5))
  };

  cachedConfig = {
    base,
    backend,
    textSearch,
    classifier,
    cache,
    sessions,
    discovery,
    compiler,
    pipeline
  };

  return cachedConfig;
}

export function resetSearchServiceConfig(): void {
  cachedConfig = null;
}
