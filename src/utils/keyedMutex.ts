/**
 * Serializes async work per key. Tasks for the same key run one after
 * another in call order; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Last one out drops the key so the map does not grow with every order id
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
