/**
 * Keeps the most recent `capacity` bytes of a session's output for late-joining subscribers.
 * Chunks are stored as received and trimmed from the front once the window overflows.
 */
export class Scrollback {
  private chunks: Buffer[] = [];
  private size = 0;
  private written = 0;

  constructor(private readonly capacity: number) {}

  get length(): number {
    return this.size;
  }

  // Total bytes ever appended, including those that have scrolled out.
  get totalBytes(): number {
    return this.written;
  }

  append(chunk: Buffer): void {
    if (chunk.length === 0) return;
    this.written += chunk.length;
    if (chunk.length >= this.capacity) {
      this.chunks = [Buffer.from(chunk.subarray(chunk.length - this.capacity))];
      this.size = this.capacity;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.capacity) {
      const head = this.chunks[0];
      if (!head) break;
      const excess = this.size - this.capacity;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  snapshot(maxBytes?: number): Buffer {
    const all = Buffer.concat(this.chunks, this.size);
    if (maxBytes === undefined || maxBytes >= all.length) return all;
    return all.subarray(all.length - Math.max(0, maxBytes));
  }

  clear(): void {
    this.chunks = [];
    this.size = 0;
  }
}
