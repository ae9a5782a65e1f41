// src/services/session/SessionLock.ts

/**
 * Keyed FIFO mutex. Tasks for the same key run one after another in call
 * order; tasks for different keys run concurrently.
 */
export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  public async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
