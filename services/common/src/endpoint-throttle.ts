export interface EndpointThrottleOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Serializes calls per endpoint and spaces their starts at least
 * `minIntervalMs` apart. Different endpoints do not wait on each other.
 */
export class EndpointThrottle {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly lastStartedAt = new Map<string, number>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: EndpointThrottleOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  schedule<T>(endpoint: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(endpoint) ?? Promise.resolve();

    const run = previous.then(async () => {
      await this.waitForSlot(endpoint);
      this.lastStartedAt.set(endpoint, this.now());
      return task();
    });

    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(endpoint, tail);
    void tail.then(() => {
      if (this.tails.get(endpoint) === tail) {
        this.tails.delete(endpoint);
      }
    });

    return run;
  }

  private async waitForSlot(endpoint: string): Promise<void> {
    const last = this.lastStartedAt.get(endpoint);
    if (last === undefined || this.options.minIntervalMs <= 0) {
      return;
    }
    const waitMs = last + this.options.minIntervalMs - this.now();
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
