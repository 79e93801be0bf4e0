import { getLogger, type Logger } from '@orgscout/common';

import type { CandidateExtractor } from './candidate-extractor.js';
import { normalizeEntityName } from './entity-name.js';
import type { TextSearchProvider } from './text-search-client.js';
import type { Provenance, Requirements, StrategyId } from './types.js';

export interface RawCandidate {
  name: string;
  website: string | null;
  provenance: Provenance;
}

export interface StrategyOutcome {
  candidates: RawCandidate[];
  queriesRun: number;
  failedQueries: number;
}

export interface DiscoveryStrategy {
  readonly id: StrategyId;
  run(requirements: Requirements, signal?: AbortSignal): Promise<StrategyOutcome>;
}

export interface PrioritizedQuery {
  query: string;
  priority: number;
}

const SEED_QUERY_TEMPLATES = [
  (seed: string) => `companies similar to ${seed}`,
  (seed: string) => `${seed} competitors`,
  (seed: string) => `${seed} alternatives`
];

/**
 * Seeds to expand: trimmed, deduplicated by normalized name, with every
 * excluded organization removed before the cap of `maxSeeds` applies.
 */
export function selectSeeds(requirements: Requirements, maxSeeds: number): string[] {
  const excluded = new Set((requirements.exclusions ?? []).map(normalizeEntityName).filter((key) => key.length > 0));
  const seen = new Set<string>();
  const seeds: string[] = [];

  for (const raw of requirements.seeds ?? []) {
    const seed = raw.trim();
    const key = normalizeEntityName(seed);
    if (!key || excluded.has(key) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    seeds.push(seed);
  }

  return seeds.slice(0, Math.max(0, maxSeeds));
}

/** Ranked web queries built from the domain and industry keywords; highest priority first. */
export function buildKeywordQueries(requirements: Requirements): PrioritizedQuery[] {
  const domains = requirements.domainKeywords.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
  const industries = (requirements.industryKeywords ?? []).map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
  const role = requirements.roleTitle.trim();
  const queries: PrioritizedQuery[] = [];

  const primary = domains[0];
  if (primary) {
    queries.push({ query: `${primary} companies competitors alternatives`, priority: 90 });
  }
  domains.forEach((domain, index) => {
    queries.push({ query: `${domain} companies directory list`, priority: 80 - index });
  });
  if (primary && role) {
    queries.push({ query: `${role} companies in ${primary}`, priority: 70 });
  }
  industries.forEach((industry, index) => {
    queries.push({ query: `${industry} companies`, priority: 60 - index });
  });
  if (role) {
    queries.push({ query: `${role} companies`, priority: 10 });
  }

  const seen = new Set<string>();
  return queries
    .filter((entry) => {
      const key = entry.query.toLowerCase();
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .sort((left, right) => right.priority - left.priority);
}

/** The caller's own seed organizations, ahead of anything discovered from them. */
export class SeedListStrategy implements DiscoveryStrategy {
  readonly id = 'seed' as const;

  constructor(private readonly maxSeeds: number) {}

  async run(requirements: Requirements): Promise<StrategyOutcome> {
    const candidates = selectSeeds(requirements, this.maxSeeds).map(
      (seed, index): RawCandidate => ({
        name: seed,
        website: null,
        provenance: { strategyId: this.id, sourceQuery: null, sourceReference: null, rank: index + 1 }
      })
    );
    return { candidates, queriesRun: 0, failedQueries: 0 };
  }
}

abstract class TextSearchStrategy implements DiscoveryStrategy {
  abstract readonly id: StrategyId;
  protected readonly logger: Logger;

  constructor(
    protected readonly textSearch: TextSearchProvider,
    protected readonly extractor: CandidateExtractor,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger({ module: 'discovery-strategy' });
  }

  abstract buildQueries(requirements: Requirements): string[];

  async run(requirements: Requirements, signal?: AbortSignal): Promise<StrategyOutcome> {
    const queries = this.buildQueries(requirements);
    const candidates: RawCandidate[] = [];
    let failedQueries = 0;
    let queriesRun = 0;
    let firstError: unknown = null;

    for (const query of queries) {
      if (signal?.aborted) {
        break;
      }
      queriesRun += 1;
      try {
        const results = await this.textSearch.search(query);
        for (const candidate of this.extractor.extract(results)) {
          candidates.push({
            name: candidate.name,
            website: candidate.website,
            provenance: {
              strategyId: this.id,
              sourceQuery: query,
              sourceReference: candidate.sourceReference,
              rank: candidate.rank
            }
          });
        }
      } catch (error) {
        failedQueries += 1;
        firstError ??= error;
        this.logger.warn({ strategy: this.id, query, error }, 'Discovery query failed.');
      }
    }

    if (queriesRun > 0 && failedQueries === queriesRun) {
      throw firstError instanceof Error ? firstError : new Error(`All ${this.id} queries failed.`);
    }

    return { candidates, queriesRun, failedQueries };
  }
}

export class SeedExpansionStrategy extends TextSearchStrategy {
  readonly id = 'seed_expansion' as const;

  constructor(
    textSearch: TextSearchProvider,
    extractor: CandidateExtractor,
    private readonly maxSeeds: number,
    logger?: Logger
  ) {
    super(textSearch, extractor, logger);
  }

  buildQueries(requirements: Requirements): string[] {
    return selectSeeds(requirements, this.maxSeeds).flatMap((seed) => SEED_QUERY_TEMPLATES.map((template) => template(seed)));
  }
}

export class KeywordSearchStrategy extends TextSearchStrategy {
  readonly id = 'keyword_search' as const;

  constructor(
    textSearch: TextSearchProvider,
    extractor: CandidateExtractor,
    private readonly maxQueries: number,
    logger?: Logger
  ) {
    super(textSearch, extractor, logger);
  }

  buildQueries(requirements: Requirements): string[] {
    return buildKeywordQueries(requirements)
      .slice(0, Math.max(0, this.maxQueries))
      .map((entry) => entry.query);
  }
}
