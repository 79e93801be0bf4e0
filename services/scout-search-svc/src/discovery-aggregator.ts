import { PipelineCancelledError, ServiceError, getLogger, type Logger } from '@orgscout/common';
import pLimit from 'p-limit';

import type { DiscoveryStrategy, RawCandidate, StrategyOutcome } from './discovery-strategies.js';
import { normalizeEntityName } from './entity-name.js';
import type { CacheMetrics, DiscoveryResult, Entity, Requirements, ResolutionHints, ResolutionResult, StrategyFailure } from './types.js';

/** The slice of the resolution cache discovery depends on. */
export interface EntityResolutionPort {
  resolve(name: string, hints?: ResolutionHints): Promise<ResolutionResult>;
  getMetrics(): CacheMetrics;
}

export interface DiscoveryAggregatorOptions {
  strategyConcurrency: number;
  resolutionConcurrency: number;
  maxCandidates: number;
  logger?: Logger;
}

export interface DiscoveryProgress {
  stage: 'discovery' | 'resolution';
  counts: Record<string, number>;
}

export interface DiscoverOptions {
  signal?: AbortSignal;
  onProgress?: (progress: DiscoveryProgress) => void;
}

export function diffMetrics(after: CacheMetrics, before: CacheMetrics): CacheMetrics {
  return {
    hits: after.hits - before.hits,
    misses: after.misses - before.misses,
    errors: after.errors - before.errors,
    negativeHits: after.negativeHits - before.negativeHits,
    negativeWrites: after.negativeWrites - before.negativeWrites,
    cacheWriteErrors: after.cacheWriteErrors - before.cacheWriteErrors,
    coalesced: after.coalesced - before.coalesced,
    profileHits: after.profileHits - before.profileHits,
    profileMisses: after.profileMisses - before.profileMisses,
    profileErrors: after.profileErrors - before.profileErrors
  };
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(`aborted during ${stage}`, { stage });
  }
}

type StrategyRun = { strategy: DiscoveryStrategy; outcome: StrategyOutcome | null; error: unknown };

export class DiscoveryAggregator {
  private readonly logger: Logger;

  constructor(
    private readonly strategies: DiscoveryStrategy[],
    private readonly resolution: EntityResolutionPort,
    private readonly options: DiscoveryAggregatorOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'discovery-aggregator' });
  }

  async discover(requirements: Requirements, options: DiscoverOptions = {}): Promise<DiscoveryResult> {
    const { signal, onProgress } = options;
    const metricsBefore = this.resolution.getMetrics();

    throwIfAborted(signal, 'discovery');
    const runs = await this.runStrategies(requirements, signal);
    throwIfAborted(signal, 'discovery');

    const strategyFailures: StrategyFailure[] = [];
    let failedQueries = 0;
    const candidates: RawCandidate[] = [];
    for (const run of runs) {
      if (run.outcome) {
        candidates.push(...run.outcome.candidates);
        failedQueries += run.outcome.failedQueries;
      } else {
        strategyFailures.push({
          strategyId: run.strategy.id,
          code: run.error instanceof ServiceError ? run.error.code : 'strategy_failed',
          message: run.error instanceof Error ? run.error.message : String(run.error)
        });
      }
    }

    const { entities, excludedCount } = this.mergeCandidates(candidates, requirements.exclusions ?? []);
    onProgress?.({
      stage: 'discovery',
      counts: { candidates: candidates.length, unique: entities.length, excluded: excludedCount, failedStrategies: strategyFailures.length }
    });

    const { resolvedCount, resolutionFailures } = await this.resolveEntities(entities, signal, onProgress);
    throwIfAborted(signal, 'resolution');

    const result: DiscoveryResult = {
      entities,
      partial: strategyFailures.length > 0 || failedQueries > 0,
      strategyFailures,
      candidatesConsidered: candidates.length,
      excludedCount,
      resolvedCount,
      unresolvedCount: entities.length - resolvedCount,
      resolutionFailures,
      cacheMetrics: diffMetrics(this.resolution.getMetrics(), metricsBefore)
    };

    this.logger.info(
      {
        candidates: result.candidatesConsidered,
        entities: entities.length,
        resolved: resolvedCount,
        resolutionFailures,
        partial: result.partial
      },
      'Discovery completed.'
    );

    return result;
  }

  private async runStrategies(requirements: Requirements, signal?: AbortSignal): Promise<StrategyRun[]> {
    const limit = pLimit(Math.max(1, this.options.strategyConcurrency));

    return Promise.all(
      this.strategies.map((strategy) =>
        limit(async (): Promise<StrategyRun> => {
          try {
            const outcome = await strategy.run(requirements, signal);
            return { strategy, outcome, error: null };
          } catch (error) {
            this.logger.warn({ strategy: strategy.id, error }, 'Discovery strategy failed; continuing with the others.');
            return { strategy, outcome: null, error };
          }
        })
      )
    );
  }

  /** Deduplicates by normalized name in strategy order, merging provenance. */
  private mergeCandidates(candidates: RawCandidate[], exclusions: string[]): { entities: Entity[]; excludedCount: number } {
    const excluded = new Set(exclusions.map(normalizeEntityName).filter((key) => key.length > 0));
    const byKey = new Map<string, Entity>();
    const excludedKeys = new Set<string>();

    for (const candidate of candidates) {
      const normalizedKey = normalizeEntityName(candidate.name);
      if (!normalizedKey) {
        continue;
      }
      if (excluded.has(normalizedKey)) {
        excludedKeys.add(normalizedKey);
        continue;
      }

      const existing = byKey.get(normalizedKey);
      if (existing) {
        existing.provenance.push(candidate.provenance);
        if (!existing.metadata.website && candidate.website) {
          existing.metadata.website = candidate.website;
        }
        continue;
      }

      if (byKey.size >= this.options.maxCandidates) {
        continue;
      }

      byKey.set(normalizedKey, {
        name: candidate.name.trim(),
        normalizedKey,
        stableId: null,
        metadata: candidate.website ? { website: candidate.website } : {},
        provenance: [candidate.provenance],
        scored: false
      });
    }

    return { entities: Array.from(byKey.values()), excludedCount: excludedKeys.size };
  }

  private async resolveEntities(
    entities: Entity[],
    signal: AbortSignal | undefined,
    onProgress: DiscoverOptions['onProgress']
  ): Promise<{ resolvedCount: number; resolutionFailures: number }> {
    const limit = pLimit(Math.max(1, this.options.resolutionConcurrency));
    let completed = 0;
    let resolvedCount = 0;
    let resolutionFailures = 0;

    await Promise.all(
      entities.map((entity) =>
        limit(async () => {
          if (signal?.aborted) {
            return;
          }

          try {
            const resolution = await this.resolution.resolve(entity.name, { website: entity.metadata.website });
            entity.resolution = resolution;
            entity.stableId = resolution.stableId;
            entity.metadata = { ...resolution.metadata, ...entity.metadata };
            if (resolution.stableId) {
              resolvedCount += 1;
            } else if (resolution.status === 'failed') {
              resolutionFailures += 1;
            }
          } catch (error) {
            resolutionFailures += 1;
            this.logger.warn({ name: entity.name, error }, 'Entity resolution raised; leaving entity unresolved.');
          }

          completed += 1;
          onProgress?.({
            stage: 'resolution',
            counts: { completed, total: entities.length, resolved: resolvedCount, failed: resolutionFailures }
          });
        })
      )
    );

    return { resolvedCount, resolutionFailures };
  }
}
