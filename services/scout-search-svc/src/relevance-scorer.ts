import { PipelineCancelledError, ServiceError, getLogger, type Logger } from '@orgscout/common';
import { z } from 'zod';

import type { ClassifierItem, RelevanceClassifier } from './classifier-client.js';
import type { Entity, ScoredResultSet, ScoringContext } from './types.js';

const replySchema = z.object({ scores: z.array(z.unknown()) });

const itemSchema = z.object({
  id: z.string(),
  score: z.number().finite(),
  rationale: z.string().optional()
});

export interface RelevanceScorerOptions {
  batchSize: number;
  scoreMin: number;
  scoreMax: number;
  logger?: Logger;
}

export interface ScoreOptions {
  skip?: boolean;
  signal?: AbortSignal;
  onBatch?: (progress: { completed: number; total: number; scored: number }) => void;
}

interface ItemVerdict {
  score: number;
  rationale?: string;
}

export class RelevanceScorer {
  private readonly logger: Logger;

  constructor(
    private readonly classifier: RelevanceClassifier | null,
    private readonly options: RelevanceScorerOptions
  ) {
    this.logger = options.logger ?? getLogger({ module: 'relevance-scorer' });
  }

  /**
   * Scores entities in fixed-size batches. An entity only receives
   * `relevanceScore` when the classifier returned a valid, in-range score
   * for it; everything else lands in `unscored` in discovery order.
   */
  async score(entities: Entity[], context: ScoringContext, options: ScoreOptions = {}): Promise<ScoredResultSet> {
    if (options.skip || !this.classifier) {
      return {
        scored: [],
        unscored: entities.map((entity) => this.asUnscored(entity)),
        metadata: { scoringSkipped: true, batches: 0, failedBatches: 0, parseFailures: 0 }
      };
    }

    const batchSize = Math.max(1, this.options.batchSize);
    const total = Math.ceil(entities.length / batchSize);
    const results: Entity[] = [];
    let failedBatches = 0;
    let parseFailures = 0;

    for (let batchIndex = 0; batchIndex < total; batchIndex += 1) {
      if (options.signal?.aborted) {
        throw new PipelineCancelledError('aborted during scoring', { stage: 'scoring', completedBatches: batchIndex });
      }

      const offset = batchIndex * batchSize;
      const batch = entities.slice(offset, offset + batchSize);
      const items: ClassifierItem[] = batch.map((entity, index) => ({
        id: `e${offset + index + 1}`,
        name: entity.name,
        metadata: entity.metadata
      }));

      let verdicts: Map<string, ItemVerdict>;
      try {
        const reply = await this.classifier.classify(items, context);
        const parsed = this.parseReply(reply, items);
        verdicts = parsed.verdicts;
        parseFailures += batch.length - verdicts.size;
      } catch (error) {
        failedBatches += 1;
        const code = error instanceof ServiceError ? error.code : 'classifier_failed';
        this.logger.warn({ batch: batchIndex, size: batch.length, code, error }, 'Scoring batch failed; leaving entities unscored.');
        results.push(...batch.map((entity) => this.asUnscored(entity, `batch_failed:${code}`)));
        options.onBatch?.({ completed: batchIndex + 1, total, scored: results.filter((entity) => entity.scored).length });
        continue;
      }

      batch.forEach((entity, index) => {
        const verdict = verdicts.get(items[index]?.id ?? '');
        if (verdict) {
          results.push({
            ...entity,
            provenance: [...entity.provenance],
            metadata: { ...entity.metadata },
            scored: true,
            relevanceScore: verdict.score,
            rationale: verdict.rationale,
            scoreFailure: undefined
          });
        } else {
          results.push(this.asUnscored(entity, 'unparseable_item'));
        }
      });

      options.onBatch?.({ completed: batchIndex + 1, total, scored: results.filter((entity) => entity.scored).length });
    }

    const scored = results
      .filter((entity) => entity.scored)
      .sort((left, right) => (right.relevanceScore ?? 0) - (left.relevanceScore ?? 0));
    const unscored = results.filter((entity) => !entity.scored);

    this.logger.info({ scored: scored.length, unscored: unscored.length, failedBatches, parseFailures }, 'Scoring completed.');

    return {
      scored,
      unscored,
      metadata: { scoringSkipped: false, batches: total, failedBatches, parseFailures }
    };
  }

  /** Per-item validation: a bad item is dropped without discarding the rest of its batch. */
  private parseReply(reply: unknown, items: ClassifierItem[]): { verdicts: Map<string, ItemVerdict> } {
    const envelope = replySchema.safeParse(reply);
    if (!envelope.success) {
      throw new ServiceError('Classifier reply is missing a scores array.', { statusCode: 502, code: 'unparseable_response' });
    }

    const expected = new Set(items.map((item) => item.id));
    const verdicts = new Map<string, ItemVerdict>();

    for (const raw of envelope.data.scores) {
      const item = itemSchema.safeParse(raw);
      if (!item.success) {
        continue;
      }
      const { id, score, rationale } = item.data;
      if (!expected.has(id) || verdicts.has(id)) {
        continue;
      }
      if (score < this.options.scoreMin || score > this.options.scoreMax) {
        continue;
      }
      verdicts.set(id, { score, rationale: rationale?.trim() || undefined });
    }

    return { verdicts };
  }

  private asUnscored(entity: Entity, failure?: string): Entity {
    const copy: Entity = {
      ...entity,
      provenance: [...entity.provenance],
      metadata: { ...entity.metadata },
      scored: false
    };
    delete copy.relevanceScore;
    delete copy.rationale;
    if (failure) {
      copy.scoreFailure = failure;
    } else {
      delete copy.scoreFailure;
    }
    return copy;
  }
}
