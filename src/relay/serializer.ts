/**
 * Per-key task serialization
 *
 * Tasks sharing a key run one after another in submission order; tasks with
 * different keys never wait on each other.
 */
export class KeyedSerializer {
  private tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    // A failed predecessor must not block the chain
    const result = previous.then(task, task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  // Number of keys with work queued or in flight
  get pending(): number {
    return this.tails.size;
  }
}
