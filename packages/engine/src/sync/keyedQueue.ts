type Task<T> = () => Promise<T>;

/**
 * Serialises tasks that share a key. Tasks for different keys run independently, and a
 * failed task does not block the ones queued after it.
 */
export class KeyedQueue {
  private readonly queues = new Map<string, Promise<void>>();

  async run<T>(key: string, task: Task<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();

    const next = previous.catch(() => undefined).then(task);

    const settled = next.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, settled);
    void settled.then(() => {
      if (this.queues.get(key) === settled) {
        this.queues.delete(key);
      }
    });

    return next;
  }

  /** Resolves once every task queued so far has settled. */
  async idle(): Promise<void> {
    await Promise.all(this.queues.values());
  }

  get size(): number {
    return this.queues.size;
  }
}
