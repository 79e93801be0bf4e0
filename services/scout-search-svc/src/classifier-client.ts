import {
  CircuitBreaker,
  ExternalPermanentError,
  classifyHttpError,
  emitCostMetric,
  getLogger,
  withRetry,
  type Logger
} from '@orgscout/common';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import type { ClassifierConfig } from './config.js';
import type { EntityMetadata, ScoringContext } from './types.js';

export interface ClassifierItem {
  id: string;
  name: string;
  metadata: EntityMetadata;
}

/**
 * External relevance classifier. Returns the decoded JSON body as-is;
 * validating individual items is the scorer's job.
 */
export interface RelevanceClassifier {
  classify(items: ClassifierItem[], context: ScoringContext): Promise<unknown>;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional()
    })
    .optional()
});

export interface ClassifierClientOptions {
  logger?: Logger;
  http?: AxiosInstance;
  breaker?: CircuitBreaker;
}

function buildMessages(items: ClassifierItem[], context: ScoringContext, config: ClassifierConfig) {
  const system = [
    'You rate how relevant each organization is as a place to source candidates for a role.',
    `Reply with JSON: {"scores": [{"id": string, "score": number, "rationale": string}]}.`,
    `Scores are numbers from ${config.scoreMin} to ${config.scoreMax}. Include every id exactly once.`
  ].join(' ');

  const user = JSON.stringify({
    role: context.roleTitle,
    seniority: context.seniority ?? null,
    mustHave: context.mustHave,
    niceToHave: context.niceToHave,
    domain: context.domain,
    organizations: items.map((item) => ({
      id: item.id,
      name: item.name,
      industry: item.metadata.industry ?? null,
      size: item.metadata.size ?? null,
      location: item.metadata.location ?? null,
      description: item.metadata.description ?? null
    }))
  });

  return [
    { role: 'system', content: system },
    { role: 'user', content: user }
  ];
}

/** OpenAI-compatible chat completions classifier guarded by a circuit breaker. */
export class ClassifierClient implements RelevanceClassifier {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: ClassifierConfig, options: ClassifierClientOptions = {}) {
    this.logger = options.logger ?? getLogger({ module: 'classifier-client' });
    this.http =
      options.http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json'
        }
      });
    this.breaker =
      options.breaker ??
      new CircuitBreaker({
        failureThreshold: config.circuitBreakerFailures,
        successThreshold: 1,
        cooldownMs: config.circuitBreakerCooldownMs,
        onStateChange: (from, to) => {
          const log = to === 'OPEN' ? this.logger.warn.bind(this.logger) : this.logger.info.bind(this.logger);
          log({ from, to, cooldownMs: config.circuitBreakerCooldownMs }, 'Classifier circuit changed state.');
        }
      });
  }

  async classify(items: ClassifierItem[], context: ScoringContext): Promise<unknown> {
    const payload = {
      model: this.config.model,
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: buildMessages(items, context, this.config)
    };

    const started = Date.now();
    const response = await this.breaker.exec(() =>
      withRetry(() => this.http.post<unknown>('/chat/completions', payload), {
        dependency: 'classifier',
        policy: {
          retries: this.config.retries,
          minDelayMs: this.config.retryDelayMs,
          maxDelayMs: this.config.retryDelayMs * 3,
          factor: 1,
          timeoutMs: this.config.timeoutMs
        },
        logger: this.logger,
        classify: (error) => classifyHttpError(error, { dependency: 'classifier', details: { batchSize: items.length } })
      })
    );

    const completion = completionSchema.safeParse(response.data);
    if (!completion.success) {
      throw new ExternalPermanentError('Classifier returned an unrecognised completion shape.', { code: 'unexpected_response' });
    }

    const usage = completion.data.usage;
    if (usage) {
      const tokens = (usage.prompt_tokens ?? 0) + (usage.completion_tokens ?? 0);
      emitCostMetric({
        api_name: 'chat_completions',
        provider: 'classifier',
        cost_category: 'relevance_scoring',
        cost_cents: tokens * 0.00006,
        metadata: { model: this.config.model, tokens }
      });
    }

    const content = completion.data.choices[0]?.message.content ?? '';
    this.logger.debug({ items: items.length, latencyMs: Date.now() - started }, 'Classifier batch completed.');

    try {
      const decoded: unknown = JSON.parse(content);
      return decoded;
    } catch (error) {
      throw new ExternalPermanentError('Classifier reply was not valid JSON.', {
        code: 'unparseable_response',
        details: { preview: content.slice(0, 200) },
        cause: error
      });
    }
  }
}
