// ── Bounded Worker Pool ─────────────────────────────────────────────────────

export type PoolJob = () => Promise<void>;

/**
 * Admits jobs in submission order, running at most `maxConcurrency` at once.
 * A job that rejects is reported through `onError` and frees its slot.
 */
export class WorkerPool {
  private readonly maxConcurrency: number;
  private readonly onError: (err: unknown) => void;
  private readonly queue: PoolJob[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: {
    readonly maxConcurrency: number;
    readonly onError?: (err: unknown) => void;
  }) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError(
        `maxConcurrency must be a positive integer, got ${options.maxConcurrency}`,
      );
    }
    this.maxConcurrency = options.maxConcurrency;
    this.onError = options.onError ?? (() => {});
  }

  get active(): number {
    return this.running;
  }

  get queued(): number {
    return this.queue.length;
  }

  submit(job: PoolJob): void {
    this.queue.push(job);
    this.drain();
  }

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.maxConcurrency) {
      const job = this.queue.shift();
      if (!job) break;
      this.launch(job);
    }
    if (this.running === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private launch(job: PoolJob): void {
    this.running++;
    Promise.resolve()
      .then(job)
      .then(
        () => this.release(),
        (err: unknown) => {
          this.onError(err);
          this.release();
        },
      );
  }

  private release(): void {
    this.running--;
    this.drain();
  }
}
