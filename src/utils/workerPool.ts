import { setTimeout as sleep } from 'timers/promises';

export class WorkerPoolTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`worker_pool_timeout:${timeoutMs}ms`);
    this.name = 'WorkerPoolTimeoutError';
  }
}

interface QueuedJob {
  start: () => void;
}

/**
 * Bounded pool for blocking-ish side work (notification delivery). At most
 * `concurrency` jobs run at once; the rest wait in FIFO order.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: QueuedJob[] = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`invalid_worker_pool_concurrency:${concurrency}`);
    }
  }

  get size() {
    return this.concurrency;
  }

  get activeCount() {
    return this.active;
  }

  get queuedCount() {
    return this.waiting.length;
  }

  run<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active += 1;
        void job()
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.waiting.shift()?.start();
          });
      };
      if (this.active < this.concurrency) {
        start();
      } else {
        this.waiting.push({ start });
      }
    });
  }

  /**
   * Like `run`, but gives up waiting after `timeoutMs`. The job itself keeps its
   * worker slot until it settles.
   */
  async runWithTimeout<T>(job: () => Promise<T>, timeoutMs: number): Promise<T> {
    const controller = new AbortController();
    const timeout = sleep(timeoutMs, undefined, { signal: controller.signal }).then(() => {
      throw new WorkerPoolTimeoutError(timeoutMs);
    });
    try {
      return await Promise.race([this.run(job), timeout]);
    } finally {
      controller.abort();
      // the aborted sleep rejects; nothing waits on it any more
      timeout.catch(() => undefined);
    }
  }
}
