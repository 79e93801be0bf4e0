export type LookupTier = 'name' | 'website' | 'fuzzy';

export interface EntityMetadata {
  industry?: string;
  size?: string;
  employeeCount?: number;
  location?: string;
  website?: string;
  description?: string;
  matchedName?: string;
}

export type StrategyId = 'seed' | 'seed_expansion' | 'keyword_search';

export interface Provenance {
  strategyId: StrategyId;
  sourceQuery: string | null;
  sourceReference: string | null;
  rank: number;
}

export type ResolutionStatus = 'resolved' | 'not_found' | 'failed';

export interface ResolutionResult {
  stableId: string | null;
  confidence: number | null;
  fromCache: boolean;
  status: ResolutionStatus;
  lookupTier: LookupTier | null;
  metadata: EntityMetadata;
}

export interface ResolutionHints {
  website?: string;
  industry?: string;
  location?: string;
}

export interface Entity {
  name: string;
  normalizedKey: string;
  stableId: string | null;
  metadata: EntityMetadata;
  provenance: Provenance[];
  resolution?: ResolutionResult;
  relevanceScore?: number;
  rationale?: string;
  scored: boolean;
  /** Set when the classifier answered for a batch but this entity's item could not be used. */
  scoreFailure?: string;
}

export interface LookupCacheEntry {
  normalizedKey: string;
  stableId: string | null;
  confidence: number | null;
  lookupTier: LookupTier | null;
  metadata: EntityMetadata | null;
  hitCount: number;
  lastAccessedAt: Date | null;
  createdAt: Date | null;
  /** When the stored outcome was last written; expiry is measured from here. */
  resolvedAt: Date | null;
}

export type ProfilePayload = Record<string, unknown>;

export interface ProfileCacheEntry {
  stableId: string;
  payload: ProfilePayload;
  lastFetchedAt: Date;
}

export interface CacheStats {
  totalEntries: number;
  positiveEntries: number;
  negativeEntries: number;
  profileEntries: number;
}

export interface CacheMetrics {
  hits: number;
  misses: number;
  errors: number;
  negativeHits: number;
  negativeWrites: number;
  cacheWriteErrors: number;
  coalesced: number;
  profileHits: number;
  profileMisses: number;
  profileErrors: number;
}

export interface Requirements {
  roleTitle: string;
  seniority?: string;
  mustHave: string[];
  niceToHave: string[];
  domainKeywords: string[];
  industryKeywords?: string[];
  seeds?: string[];
  exclusions?: string[];
  location?: string;
  locationRequired?: boolean;
  keywordRequired?: boolean;
}

export interface StrategyFailure {
  strategyId: StrategyId;
  code: string;
  message: string;
}

export interface DiscoveryResult {
  entities: Entity[];
  partial: boolean;
  strategyFailures: StrategyFailure[];
  candidatesConsidered: number;
  excludedCount: number;
  resolvedCount: number;
  unresolvedCount: number;
  resolutionFailures: number;
  cacheMetrics: CacheMetrics;
}

export interface ScoringContext {
  roleTitle: string;
  seniority?: string;
  mustHave: string[];
  niceToHave: string[];
  domain: string[];
}

export interface ScoringMetadata {
  scoringSkipped: boolean;
  batches: number;
  failedBatches: number;
  parseFailures: number;
}

export interface ScoredResultSet {
  scored: Entity[];
  unscored: Entity[];
  metadata: ScoringMetadata;
}

export interface FilterRequest {
  requiredStableIds: string[];
  keyword?: string;
  keywordRequired?: boolean;
  location?: string;
  locationRequired?: boolean;
}

export interface BoolQuery {
  must?: QueryClause[];
  should?: QueryClause[];
  minimum_should_match?: number;
}

export type QueryClause =
  | { term: Record<string, string> }
  | { match_phrase: Record<string, string> }
  | { query_string: { query: string; default_field: string; default_operator: 'OR' | 'AND' } }
  | { nested: { path: string; query: QueryClause } }
  | { bool: BoolQuery };

export interface CompiledQuery {
  query: { bool: BoolQuery };
}

export interface PersonRecord {
  recordId: string;
  fullName: string | null;
  headline: string | null;
  currentTitle: string | null;
  currentOrganization: string | null;
  location: string | null;
  profileUrl: string | null;
  raw: Record<string, unknown>;
}

export interface SearchPage<T> {
  items: T[];
  totalEstimate: number | null;
}

export type SessionStatus = 'created' | 'fetching' | 'has_more' | 'exhausted' | 'expired';

/** One organization batch of a session; each runs its own query up to the backend's page limit. */
export interface SessionBatch {
  compiledQuery: CompiledQuery;
  queryHash: string;
  cursor: number;
  totalEstimate: number | null;
  /** Raw items the backend has sent for this batch, duplicates included. */
  fetchedItems: number;
  exhausted: boolean;
}

export interface SearchSession {
  sessionId: string;
  batches: SessionBatch[];
  batchIndex: number;
  /** Every record id fetched so far, whether returned or still pending. */
  seenRecordIds: string[];
  /** Fetched records beyond what the caller asked for, served first by the next call. */
  pendingRecords: PersonRecord[];
  createdAt: string;
  ttlHours: number;
  status: SessionStatus;
  totalEstimate: number | null;
  returnedCount: number;
  lastFetchedAt: string | null;
  /** Set by refresh; later pages of the session skip the shared page cache too. */
  bypassPageCache: boolean;
}

export interface PersonSearchResult {
  sessionId: string;
  records: PersonRecord[];
  hasMore: boolean;
  totalEstimate: number | null;
  returnedCount: number;
  failedPages: number;
}

export type PipelineStage = 'discovery' | 'resolution' | 'scoring' | 'sampling';
export type PipelinePhase = 'start' | 'progress' | 'complete' | 'failed' | 'skipped';

export interface ProgressEvent {
  runId: string;
  sequence: number;
  stage: PipelineStage;
  phase: PipelinePhase;
  counts: Record<string, number>;
  message?: string;
  emittedAt: string;
}
