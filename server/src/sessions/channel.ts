export type Subscriber<T> = (message: T) => void;

/**
 * Per-session publish/subscribe channel. Publishing iterates over a snapshot of the current
 * subscribers, so subscribing or unsubscribing from inside a delivery never disturbs that delivery.
 */
export class SessionChannel<T> {
  private readonly subscribers = new Map<string, Subscriber<T>>();
  private closed = false;

  get size(): number {
    return this.subscribers.size;
  }

  has(id: string): boolean {
    return this.subscribers.has(id);
  }

  ids(): string[] {
    return [...this.subscribers.keys()];
  }

  subscribe(id: string, fn: Subscriber<T>): () => void {
    if (this.closed) return () => undefined;
    this.subscribers.set(id, fn);
    return () => this.unsubscribe(id, fn);
  }

  unsubscribe(id: string, fn?: Subscriber<T>): boolean {
    const cur = this.subscribers.get(id);
    if (!cur || (fn && cur !== fn)) return false;
    this.subscribers.delete(id);
    return true;
  }

  /** Returns the ids whose handler threw; the remaining subscribers still receive the message. */
  publish(message: T): string[] {
    const failed: string[] = [];
    for (const [id, fn] of [...this.subscribers]) {
      // Unsubscribed earlier in this same publish: skip.
      if (this.subscribers.get(id) !== fn) continue;
      try {
        fn(message);
      } catch {
        failed.push(id);
      }
    }
    return failed;
  }

  close(): void {
    this.closed = true;
    this.subscribers.clear();
  }
}
