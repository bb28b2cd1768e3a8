/**
 * Promise-chained mutual exclusion. Callers queue in arrival order; the section
 * passed to `runExclusive` never interleaves with another one on the same mutex.
 */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  isLocked() {
    return this.pending > 0;
  }

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const prev = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;
    try {
      await prev;
      return await section();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
