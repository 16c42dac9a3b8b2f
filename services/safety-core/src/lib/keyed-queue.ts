/**
 * Runs tasks one at a time per key; different keys run independently.
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail never rejects so one failed task does not poison the key.
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

  /** Keys with queued or running work */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
