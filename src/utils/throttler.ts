/**
 * FIFO throttler spacing out statement fetches.
 * Tasks start in submission order with at least `minIntervalMs` between
 * starts; a task whose signal is aborted before it starts is skipped.
 */
export class RequestThrottler {
  private lastStart = 0;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(private readonly minIntervalMs: number = 0) {}

  schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const run = this.chain.then(async () => {
      const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
      if (waitMs > 0 && this.lastStart > 0) {
        await sleep(waitMs);
      }
      signal?.throwIfAborted();
      this.lastStart = Date.now();
      return fn();
    });
    // A failed task must not stall the tasks queued behind it; its caller
    // still receives the rejection through `run`.
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
