import pRetry, { AbortError } from 'p-retry';
import pTimeout from 'p-timeout';

import { classifyHttpError, isTransientError, type ServiceError } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts is `retries + 1`. */
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  /** Per-attempt timeout; zero or less disables it. */
  timeoutMs: number;
  randomize?: boolean;
}

export type RetryState =
  | { status: 'pending' }
  | { status: 'retrying'; attempt: number; lastError: ServiceError }
  | { status: 'succeeded'; attempts: number }
  | { status: 'failed'; attempts: number; error: ServiceError };

export interface RetryStateMachineOptions {
  dependency: string;
  policy: RetryPolicy;
  logger?: Logger;
  signal?: AbortSignal;
  classify?: (error: unknown) => ServiceError;
  onTransition?: (state: RetryState) => void;
}

/**
 * Runs an external call as `pending -> retrying(n) -> succeeded | failed`.
 * Only transient failures move to `retrying`; anything else fails on the spot.
 */
export class RetryStateMachine<T> {
  private state: RetryState = { status: 'pending' };
  private readonly logger: Logger;
  private readonly classify: (error: unknown) => ServiceError;

  constructor(private readonly options: RetryStateMachineOptions) {
    this.logger = options.logger ?? getLogger({ module: 'retry', dependency: options.dependency });
    this.classify = options.classify ?? ((error) => classifyHttpError(error, { dependency: options.dependency }));
  }

  getState(): RetryState {
    return this.state;
  }

  async run(operation: (attempt: number) => Promise<T>): Promise<T> {
    if (this.state.status !== 'pending') {
      throw new Error(`Retry state machine for ${this.options.dependency} has already run.`);
    }

    const { policy } = this.options;
    let attempts = 0;

    try {
      const result = await pRetry(
        async (attempt) => {
          attempts = attempt;
          try {
            return await this.withTimeout(operation(attempt));
          } catch (error) {
            const classified = this.classify(error);
            if (!isTransientError(classified)) {
              throw new AbortError(classified);
            }
            throw classified;
          }
        },
        {
          retries: policy.retries,
          factor: policy.factor ?? 2,
          minTimeout: policy.minDelayMs,
          maxTimeout: Math.max(policy.minDelayMs, policy.maxDelayMs),
          randomize: policy.randomize ?? true,
          signal: this.options.signal,
          onFailedAttempt: (error) => {
            if (error.retriesLeft <= 0) {
              return;
            }
            const lastError = this.classify(error);
            this.transition({ status: 'retrying', attempt: error.attemptNumber + 1, lastError });
            this.logger.warn(
              { attempt: error.attemptNumber, retriesLeft: error.retriesLeft, code: lastError.code, err: lastError.message },
              'External call failed; retrying.'
            );
          }
        }
      );
      this.transition({ status: 'succeeded', attempts });
      return result;
    } catch (error) {
      const classified = this.classify(error);
      this.transition({ status: 'failed', attempts, error: classified });
      throw classified;
    }
  }

  private withTimeout(promise: Promise<T>): Promise<T> {
    const { timeoutMs } = this.options.policy;
    if (timeoutMs <= 0) {
      return promise;
    }
    return pTimeout(promise, {
      milliseconds: timeoutMs,
      message: `${this.options.dependency} call exceeded ${timeoutMs}ms.`
    });
  }

  private transition(state: RetryState): void {
    this.state = state;
    this.options.onTransition?.(state);
  }
}

export function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryStateMachineOptions
): Promise<T> {
  return new RetryStateMachine<T>(options).run(operation);
}
