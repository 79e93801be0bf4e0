import { ExternalTransientError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** Successful trial calls needed to close it again from half-open. */
  successThreshold: number;
  cooldownMs: number;
  now?: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export class CircuitOpenError extends ExternalTransientError {
  constructor(retryAt: number) {
    super('Circuit breaker is open.', { code: 'circuit_open', details: { retryAt: new Date(retryAt).toISOString() } });
    this.name = 'CircuitOpenError';
  }
}

/**
 * Fails fast while a dependency is known to be down. After `cooldownMs` one
 * trial call is let through; its outcome decides whether the circuit closes.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private trialSuccesses = 0;
  private openedUntil = 0;
  private readonly now: () => number;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    return this.state;
  }

  async exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (this.now() < this.openedUntil) {
        throw new CircuitOpenError(this.openedUntil);
      }
      this.moveTo('HALF_OPEN');
    }

    let result: T;
    try {
      result = await action();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== 'HALF_OPEN') {
      return;
    }
    this.trialSuccesses += 1;
    if (this.trialSuccesses >= this.options.successThreshold) {
      this.moveTo('CLOSED');
    }
  }

  private recordFailure(): void {
    this.consecutiveFailures += 1;
    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.options.failureThreshold) {
      this.openedUntil = this.now() + this.options.cooldownMs;
      this.moveTo('OPEN');
    }
  }

  private moveTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.trialSuccesses = 0;
    if (next === 'CLOSED') {
      this.consecutiveFailures = 0;
    }
    if (previous !== next) {
      this.options.onStateChange?.(previous, next);
    }
  }
}
