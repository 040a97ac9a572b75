/**
 * Serializes async tasks that share a key. Tasks on different keys run
 * concurrently; tasks on the same key run one after another in call order.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // The tail only orders the next task; the caller still sees this task's rejection.
    const tail = current.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
