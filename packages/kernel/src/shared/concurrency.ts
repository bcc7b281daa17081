/**
 * Counting semaphore bounding how many node tasks or map items are in
 * flight at once.
 */
export class Semaphore {
  private available: number;
  private queue: Array<() => void> = [];
  private readonly capacity: number;

  constructor(limit: number) {
    this.available = Math.max(1, Math.floor(limit || 1));
    this.capacity = this.available;
  }

  get used(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.queue.length;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return () => this.release();
    }
    await new Promise<void>((resolve) => this.queue.push(resolve));
    this.available -= 1;
    return () => this.release();
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    this.available += 1;
    if (this.available > this.capacity) this.available = this.capacity;
    const next = this.queue.shift();
    if (next) next();
  }
}
