/**
 * Caps how many filesystem tasks are in flight at once. Excess tasks wait in FIFO order, so one
 * slow disk request delays only what is queued behind it, never the event loop.
 */
export class WorkerPool {
  private active = 0;
  // Each job settles its caller's promise itself and never rejects.
  private queue: Array<() => Promise<void>> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) throw new Error(`invalid pool size: ${concurrency}`);
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const job = this.queue.shift();
      if (!job) return;
      this.active += 1;
      void job().finally(() => {
        this.active -= 1;
        this.drain();
      });
    }
  }
}
