/**
 * Collapses concurrent calls for the same key into one in-flight promise.
 * The entry is dropped once it settles, so a later call fetches again.
 */
export class RequestCoalescer<T> {
  private readonly pendingRequests = new Map<string, Promise<T>>();
  private coalesced = 0;

  getOrFetch(key: string, fetcher: () => Promise<T>): Promise<T> {
    const existing = this.pendingRequests.get(key);
    if (existing) {
      this.coalesced += 1;
      return existing;
    }

    const promise = Promise.resolve()
      .then(fetcher)
      .finally(() => {
        this.pendingRequests.delete(key);
      });

    this.pendingRequests.set(key, promise);
    return promise;
  }

  isPending(key: string): boolean {
    return this.pendingRequests.has(key);
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }

  /** Calls that joined an existing fetch instead of starting one. */
  get coalescedCount(): number {
    return this.coalesced;
  }

  clear(): void {
    this.pendingRequests.clear();
  }
}
