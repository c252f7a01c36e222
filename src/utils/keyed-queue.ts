/**
 * Serializes async tasks that share a key; tasks under different keys run concurrently.
 *
 * Only protects callers inside this process.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain continues whether or not this task fails; the caller sees the failure
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get size(): number {
    return this.tails.size;
  }
}
