import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { PipelineCancelledError, ServiceError, getLogger, type Logger } from '@orgscout/common';

import type { DiscoveryAggregator, DiscoveryProgress } from './discovery-aggregator.js';
import { compileQueryBatches, type QueryCompilerOptions } from './query-compiler.js';
import type { RelevanceScorer } from './relevance-scorer.js';
import type { SessionManager } from './session-manager.js';
import type {
  CompiledQuery,
  DiscoveryResult,
  Entity,
  PersonSearchResult,
  PipelinePhase,
  PipelineStage,
  ProgressEvent,
  Requirements,
  ScoredResultSet
} from './types.js';

export interface PipelineOrchestratorOptions {
  runTimeoutMs: number;
  selectionLimit: number;
  minRelevanceScore: number;
  /** Selected organizations per person-search batch. */
  searchBatchSize: number;
  compiler: QueryCompilerOptions;
  logger?: Logger;
}

export interface PipelineRunOptions {
  runId?: string;
  skipScoring?: boolean;
  /** Overrides the role title as the person-search keyword; an empty string disables it. */
  keyword?: string;
  signal?: AbortSignal;
}

export type PipelineRunStatus = 'completed' | 'partial' | 'no_entities';

export interface PipelineFailureCounts {
  strategies: number;
  resolution: number;
  scoringBatches: number;
  scoringParseFailures: number;
  pages: number;
}

export interface PipelineRunResult {
  runId: string;
  status: PipelineRunStatus;
  discovery: DiscoveryResult;
  scoring: ScoredResultSet;
  selected: Entity[];
  /** One query per organization batch, in selection order; empty when nothing was searched. */
  compiledQueries: CompiledQuery[];
  search: PersonSearchResult | null;
  searchError: { code: string; message: string } | null;
  failures: PipelineFailureCounts;
}

export interface PipelineRunHandle {
  runId: string;
  result: Promise<PipelineRunResult>;
  cancel(reason?: string): void;
}

/**
 * Scored entities at or above the threshold when scoring produced any;
 * otherwise resolved entities in discovery order. Only entities with a
 * stable id can feed the person search.
 */
export function selectEntities(scoring: ScoredResultSet, minScore: number, limit: number): Entity[] {
  const pool =
    scoring.scored.length > 0
      ? scoring.scored.filter((entity) => (entity.relevanceScore ?? Number.NEGATIVE_INFINITY) >= minScore)
      : scoring.unscored;
  return pool.filter((entity) => entity.stableId !== null).slice(0, Math.max(0, limit));
}

function toScoringContext(requirements: Requirements) {
  return {
    roleTitle: requirements.roleTitle,
    seniority: requirements.seniority,
    mustHave: requirements.mustHave,
    niceToHave: requirements.niceToHave,
    domain: requirements.domainKeywords
  };
}

function freezeEntities(entities: Entity[]): Entity[] {
  return entities.map((entity) => Object.freeze({ ...entity, provenance: [...entity.provenance], metadata: { ...entity.metadata } }));
}

class RunChannel {
  private sequence = 0;

  constructor(
    private readonly emitter: EventEmitter,
    readonly runId: string
  ) {}

  emit(stage: PipelineStage, phase: PipelinePhase, counts: Record<string, number> = {}, message?: string): void {
    this.sequence += 1;
    const event: ProgressEvent = {
      runId: this.runId,
      sequence: this.sequence,
      stage,
      phase,
      counts,
      message,
      emittedAt: new Date().toISOString()
    };
    this.emitter.emit('progress', event);
  }
}

/**
 * Sequences discovery, resolution, scoring and sampling for one request.
 * Progress is published as `progress` events carrying a per-run sequence
 * number; listeners must not throw.
 */
export class PipelineOrchestrator extends EventEmitter {
  private readonly logger: Logger;

  constructor(
    private readonly aggregator: DiscoveryAggregator,
    private readonly scorer: RelevanceScorer,
    private readonly sessions: SessionManager,
    private readonly options: PipelineOrchestratorOptions
  ) {
    super();
    this.logger = options.logger ?? getLogger({ module: 'pipeline-orchestrator' });
  }

  start(requirements: Requirements, options: Omit<PipelineRunOptions, 'signal'> = {}): PipelineRunHandle {
    const controller = new AbortController();
    const runId = options.runId ?? randomUUID();
    return {
      runId,
      result: this.run(requirements, { ...options, runId, signal: controller.signal }),
      cancel: (reason = 'cancelled by caller') => controller.abort(new PipelineCancelledError(reason, { runId }))
    };
  }

  async run(requirements: Requirements, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const runId = options.runId ?? randomUUID();
    const channel = new RunChannel(this, runId);
    const logger = this.logger.child({ runId });
    const { signal, dispose } = this.linkSignal(options.signal, runId);
    let stage: PipelineStage = 'discovery';

    try {
      channel.emit('discovery', 'start');
      let resolutionStarted = false;
      const discovery = await this.aggregator.discover(requirements, {
        signal,
        onProgress: (progress: DiscoveryProgress) => {
          if (progress.stage === 'discovery') {
            channel.emit('discovery', 'complete', progress.counts);
            channel.emit('resolution', 'start', { total: progress.counts.unique ?? 0 });
            resolutionStarted = true;
            stage = 'resolution';
            return;
          }
          channel.emit('resolution', 'progress', progress.counts);
        }
      });
      if (!resolutionStarted) {
        channel.emit('resolution', 'start', { total: discovery.entities.length });
      }
      channel.emit('resolution', 'complete', {
        resolved: discovery.resolvedCount,
        unresolved: discovery.unresolvedCount,
        failed: discovery.resolutionFailures,
        cacheHits: discovery.cacheMetrics.hits,
        cacheMisses: discovery.cacheMetrics.misses
      });

      stage = 'scoring';
      const skipScoring = options.skipScoring ?? false;
      if (skipScoring) {
        channel.emit('scoring', 'skipped', { entities: discovery.entities.length });
      } else {
        channel.emit('scoring', 'start', { entities: discovery.entities.length });
      }
      const scoring = await this.scorer.score(discovery.entities, toScoringContext(requirements), {
        skip: skipScoring,
        signal,
        onBatch: (progress) => channel.emit('scoring', 'progress', progress)
      });
      if (!skipScoring) {
        channel.emit('scoring', scoring.metadata.scoringSkipped ? 'skipped' : 'complete', {
          scored: scoring.scored.length,
          unscored: scoring.unscored.length,
          failedBatches: scoring.metadata.failedBatches
        });
      }

      stage = 'sampling';
      if (signal.aborted) {
        throw this.cancellation(signal, 'sampling');
      }
      const selected = selectEntities(scoring, this.options.minRelevanceScore, this.options.selectionLimit);
      const result: PipelineRunResult = {
        runId,
        status: 'completed',
        discovery: { ...discovery, entities: freezeEntities(discovery.entities) },
        scoring: {
          scored: freezeEntities(scoring.scored),
          unscored: freezeEntities(scoring.unscored),
          metadata: scoring.metadata
        },
        selected: freezeEntities(selected),
        compiledQueries: [],
        search: null,
        searchError: null,
        failures: {
          strategies: discovery.strategyFailures.length,
          resolution: discovery.resolutionFailures,
          scoringBatches: scoring.metadata.failedBatches,
          scoringParseFailures: scoring.metadata.parseFailures,
          pages: 0
        }
      };

      if (selected.length === 0) {
        channel.emit('sampling', 'skipped', { selected: 0 }, 'No resolved entities to search.');
        result.status = 'no_entities';
        logger.warn({ entities: discovery.entities.length }, 'Pipeline finished without searchable entities.');
        return result;
      }

      const keyword = options.keyword ?? requirements.roleTitle;
      result.compiledQueries = compileQueryBatches(
        {
          requiredStableIds: selected.flatMap((entity) => (entity.stableId ? [entity.stableId] : [])),
          keyword,
          keywordRequired: requirements.keywordRequired,
          location: requirements.location,
          locationRequired: requirements.locationRequired
        },
        this.options.searchBatchSize,
        this.options.compiler
      );
      channel.emit('sampling', 'start', { selected: selected.length, batches: result.compiledQueries.length });

      try {
        result.search = await this.sessions.createSession(result.compiledQueries, { signal });
        result.failures.pages = result.search.failedPages;
        channel.emit('sampling', 'complete', {
          records: result.search.records.length,
          totalEstimate: result.search.totalEstimate ?? 0,
          failedPages: result.search.failedPages
        });
      } catch (error) {
        if (!(error instanceof ServiceError) || error.statusCode < 500) {
          throw error;
        }
        result.searchError = { code: error.code, message: error.message };
        channel.emit('sampling', 'failed', {}, error.message);
        logger.error({ error }, 'Person search failed.');
      }

      const failed = Object.values(result.failures).some((count) => count > 0);
      result.status = failed || discovery.partial || result.searchError ? 'partial' : 'completed';
      logger.info({ status: result.status, selected: selected.length, failures: result.failures }, 'Pipeline run finished.');
      return result;
    } catch (error) {
      const failure = signal.aborted ? this.cancellation(signal, stage) : error;
      channel.emit(stage, 'failed', {}, failure instanceof Error ? failure.message : String(failure));
      throw failure;
    } finally {
      dispose();
    }
  }

  /** Joins the caller's signal with the run timeout. */
  private linkSignal(external: AbortSignal | undefined, runId: string): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const timer =
      this.options.runTimeoutMs > 0
        ? setTimeout(() => {
            controller.abort(new PipelineCancelledError('run timed out', { runId, timeoutMs: this.options.runTimeoutMs }));
          }, this.options.runTimeoutMs)
        : null;

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer) {
          clearTimeout(timer);
        }
        external?.removeEventListener('abort', onExternalAbort);
      }
    };
  }

  private cancellation(signal: AbortSignal, stage: PipelineStage): PipelineCancelledError {
    const reason: unknown = signal.reason;
    return reason instanceof PipelineCancelledError ? reason : new PipelineCancelledError(`aborted during ${stage}`, { stage });
  }
}
