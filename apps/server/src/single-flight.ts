/**
 * Collapses concurrent calls for the same key into one in-flight promise.
 * The key is released as soon as that promise settles.
 */
export class SingleFlight<T> {
  private inflight: Map<string, Promise<T>> = new Map();

  /**
   * Returns the shared result and whether this caller joined an existing flight
   */
  async do(key: string, task: () => Promise<T>): Promise<{ value: T; shared: boolean }> {
    const existing = this.inflight.get(key);
    if (existing) {
      return { value: await existing, shared: true };
    }

    const flight = task().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, flight);
    return { value: await flight, shared: false };
  }

  get size(): number {
    return this.inflight.size;
  }
}
