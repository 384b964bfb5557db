/**
 * Serializes async work per key. Tasks on the same key run one after another
 * in call order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => undefined,
      () => undefined
    ).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);
    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
