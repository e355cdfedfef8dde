/**
 * FIFO mutual exclusion per key. Each holder chains onto the previous tail, so
 * callers that enter `run` for the same key execute in call order. Entries are
 * removed once the last queued holder releases.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const currentGate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const currentTail = previousTail.then(() => currentGate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
