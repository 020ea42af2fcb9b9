/**
 * Keyed mutual exclusion. Tasks sharing a key run one after another in call order;
 * tasks with different keys do not wait for each other.
 */
export class RepositoryLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
