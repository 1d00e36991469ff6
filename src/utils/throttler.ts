/**
 * Simple FIFO throttler to space out provider calls.
 * Ensures deterministic ordering and a minimum interval between task starts.
 */
export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number = 0,
    private readonly now: () => number = Date.now
  ) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(async () => {
      const waitMs = Math.max(0, this.minIntervalMs - (this.now() - this.lastStart));
      if (waitMs > 0) {
        await sleep(waitMs);
      }
      this.lastStart = this.now();
      return fn();
    });
    // The caller receives the rejection; the chain only needs ordering.
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
