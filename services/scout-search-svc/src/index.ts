export * from './types.js';
export { getSearchServiceConfig, resetSearchServiceConfig, type SearchServiceConfig } from './config.js';
export { compileQuery, compileQueryBatches, explainQuery, InvalidFilterError, DEFAULT_COMPILER_OPTIONS, type QueryCompilerOptions } from './query-compiler.js';
export { normalizeEntityName, nameSimilarity } from './entity-name.js';
export { EntityResolutionCache, type EntityResolutionCacheOptions } from './entity-resolution-cache.js';
export type { EntityCacheStore } from './entity-cache-store.js';
export { PgEntityCacheStore } from './pg-entity-cache-store.js';
export { DiscoveryAggregator } from './discovery-aggregator.js';
export { RelevanceScorer } from './relevance-scorer.js';
export { SessionManager, hashQuery } from './session-manager.js';
export { RedisSessionStore, type SessionStore } from './session-store.js';
export { toPersonRecord } from './person-records.js';
export {
  PipelineOrchestrator,
  selectEntities,
  type PipelineRunHandle,
  type PipelineRunOptions,
  type PipelineRunResult
} from './pipeline-orchestrator.js';
export { createScoutService, type ScoutService, type ScoutServiceOverrides } from './service.js';
