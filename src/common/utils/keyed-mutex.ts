/**
 * Serializes async tasks that share a key. Tasks with different keys run
 * concurrently; tasks with the same key run one at a time in call order.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The queue only tracks completion; the task's own rejection still reaches the caller through `run`
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a task queued or running. */
  get size(): number {
    return this.tails.size;
  }
}
