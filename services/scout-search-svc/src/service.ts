import { closeRedisClient, createPgPool, getLogger, getRedisClient, type Logger } from '@orgscout/common';

import { CandidateExtractor } from './candidate-extractor.js';
import { ClassifierClient } from './classifier-client.js';
import { CompanyLookup } from './company-lookup.js';
import { getSearchServiceConfig, type SearchServiceConfig } from './config.js';
import { DiscoveryAggregator } from './discovery-aggregator.js';
import { KeywordSearchStrategy, SeedExpansionStrategy, SeedListStrategy, type DiscoveryStrategy } from './discovery-strategies.js';
import type { EntityCacheStore } from './entity-cache-store.js';
import { EntityResolutionCache } from './entity-resolution-cache.js';
import { PgEntityCacheStore } from './pg-entity-cache-store.js';
import { PipelineOrchestrator } from './pipeline-orchestrator.js';
import { RelevanceScorer } from './relevance-scorer.js';
import { SearchBackendClient } from './search-backend-client.js';
import { SessionManager } from './session-manager.js';
import { RedisSessionStore, type SessionStore } from './session-store.js';
import { TextSearchClient } from './text-search-client.js';

export interface ScoutServiceOverrides {
  config?: SearchServiceConfig;
  cacheStore?: EntityCacheStore;
  sessionStore?: SessionStore;
}

export interface ScoutService {
  config: SearchServiceConfig;
  orchestrator: PipelineOrchestrator;
  sessions: SessionManager;
  cache: EntityResolutionCache;
  close(): Promise<void>;
}

/** Wires the pipeline against Postgres, Redis and the external APIs from configuration. */
export async function createScoutService(overrides: ScoutServiceOverrides = {}): Promise<ScoutService> {
  const config = overrides.config ?? getSearchServiceConfig();
  const logger: Logger = getLogger({ module: 'bootstrap' });

  let pgStore: PgEntityCacheStore | null = null;
  let cacheStore = overrides.cacheStore;
  if (!cacheStore) {
    pgStore = new PgEntityCacheStore(createPgPool(config.base.postgres), config.cache, getLogger({ module: 'pg-entity-cache-store' }));
    await pgStore.initialize();
    cacheStore = pgStore;
  }

  const sessionStore =
    overrides.sessionStore ??
    new RedisSessionStore(await getRedisClient(), {
      keyPrefix: config.sessions.keyPrefix,
      logger: getLogger({ module: 'session-store' })
    });

  const backend = new SearchBackendClient(config.backend, { logger: getLogger({ module: 'search-backend-client' }) });
  const lookup = new CompanyLookup(backend, {
    minConfidence: config.cache.minConfidence,
    logger: getLogger({ module: 'company-lookup' })
  });
  const cache = new EntityResolutionCache(cacheStore, lookup, backend, {
    lookupTtlMs: config.cache.lookupTtlMs,
    negativeTtlMs: config.cache.negativeTtlMs,
    profileTtlMs: config.cache.profileTtlMs,
    cacheFailedLookups: config.cache.cacheFailedLookups,
    logger: getLogger({ module: 'entity-resolution-cache' })
  });

  const strategies: DiscoveryStrategy[] = [new SeedListStrategy(config.discovery.maxSeeds)];
  if (config.textSearch.enabled) {
    const textSearch = new TextSearchClient(config.textSearch, { logger: getLogger({ module: 'text-search-client' }) });
    const extractor = new CandidateExtractor();
    const strategyLogger = getLogger({ module: 'discovery-strategy' });
    strategies.push(
      new SeedExpansionStrategy(textSearch, extractor, config.discovery.maxSeeds, strategyLogger),
      new KeywordSearchStrategy(textSearch, extractor, config.discovery.maxKeywordQueries, strategyLogger)
    );
  } else {
    logger.warn('Text search disabled; discovery limited to seed organizations.');
  }

  const aggregator = new DiscoveryAggregator(strategies, cache, {
    strategyConcurrency: config.discovery.strategyConcurrency,
    resolutionConcurrency: config.discovery.resolutionConcurrency,
    maxCandidates: config.discovery.maxCandidates,
    logger: getLogger({ module: 'discovery-aggregator' })
  });

  const classifier = config.classifier.enabled
    ? new ClassifierClient(config.classifier, { logger: getLogger({ module: 'classifier-client' }) })
    : null;
  const scorer = new RelevanceScorer(classifier, {
    batchSize: config.classifier.batchSize,
    scoreMin: config.classifier.scoreMin,
    scoreMax: config.classifier.scoreMax,
    logger: getLogger({ module: 'relevance-scorer' })
  });

  const sessions = new SessionManager(backend, sessionStore, {
    pageSize: config.backend.pageSize,
    maxPages: config.backend.maxPages,
    ttlHours: config.sessions.ttlHours,
    minFetchIntervalMs: config.backend.minIntervalMs,
    pageCacheTtlSeconds: config.sessions.pageCacheTtlSeconds,
    disablePageCache: config.sessions.disablePageCache,
    logger: getLogger({ module: 'session-manager' })
  });

  const orchestrator = new PipelineOrchestrator(aggregator, scorer, sessions, {
    runTimeoutMs: config.pipeline.runTimeoutMs,
    selectionLimit: config.pipeline.selectionLimit,
    minRelevanceScore: config.pipeline.minRelevanceScore,
    searchBatchSize: config.pipeline.searchBatchSize,
    compiler: config.compiler,
    logger: getLogger({ module: 'pipeline-orchestrator' })
  });

  logger.info(
    { service: config.base.runtime.serviceName, strategies: strategies.map((strategy) => strategy.id), scoring: classifier !== null },
    'Scout service initialized.'
  );

  return {
    config,
    orchestrator,
    sessions,
    cache,
    close: async () => {
      if (pgStore) {
        await pgStore.close();
      }
      if (!overrides.sessionStore) {
        await closeRedisClient();
      }
    }
  };
}
