/**
 * Per-key mutex / serialisation queue.
 *
 * For a given key (a session id, or a fixed aggregate name such as "trust")
 * only one async operation runs at a time. Later calls queue in FIFO order
 * and start once the previous one settles, whether it resolved or rejected.
 *
 *   const mutex = new KeyedMutex();
 *   await mutex.run(sessionId, async () => { ... });
 */

export class KeyedMutex {
  private readonly locks = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => gate);
    this.locks.set(key, tail);

    await prev;

    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys that currently have a pending or active task. */
  get size(): number {
    return this.locks.size;
  }
}
