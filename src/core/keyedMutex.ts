/**
 * In-process async mutex keyed by string (here: real file path).
 *
 * Tasks sharing a key run one at a time in call order; tasks with different keys run
 * independently. Nothing here guards against other processes touching the same file.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with a running or queued task. */
  get size(): number {
    return this.tails.size;
  }
}
