/**
 * Serializes async tasks that share a key. Tasks on different keys run
 * concurrently; tasks on the same key run one after another in call order.
 */
export class KeyedLock<K> {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly keyOf: (key: K) => string) {}

  /** Number of keys with a task running or queued */
  get size(): number {
    return this.tails.size;
  }

  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const id = this.keyOf(key);
    const previous = this.tails.get(id) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(id, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(id) === tail) {
        this.tails.delete(id);
      }
    }
  }
}
