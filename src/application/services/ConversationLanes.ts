/**
 * Runs work for one buyer strictly in arrival order while letting different
 * buyers proceed in parallel, up to a global concurrency cap.
 */
export class ConversationLanes {
  private tails: Map<string, Promise<void>> = new Map();
  private running = 0;
  private waiting: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {}

  run<T>(buyerId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(buyerId) ?? Promise.resolve();
    const result = previous.then(() => this.withSlot(task));

    // The lane only tracks completion; the caller gets the task's own outcome.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(buyerId, tail);
    void tail.then(() => {
      if (this.tails.get(buyerId) === tail) this.tails.delete(buyerId);
    });

    return result;
  }

  get activeLanes(): number {
    return this.tails.size;
  }

  private async withSlot<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.maxConcurrent) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.running -= 1;
    }
  }
}
