/**
 * Mutex
 * Serializes async work on a non-thread-safe adapter
 */

/**
 * FIFO lock, reentrant per owner.
 *
 * The owner is the execution context: a document that includes another
 * document of the same language runs the nested program inside the
 * outer program and must not wait on itself.
 */
export class Mutex {
  private locked = false;
  private owner: object | undefined;
  private readonly queue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /** Run fn holding the lock; released on every exit path */
  async runExclusive<T>(owner: object, fn: () => Promise<T>): Promise<T> {
    if (this.locked && this.owner === owner) {
      return fn();
    }

    await this.acquire();
    this.owner = owner;
    try {
      return await fn();
    } finally {
      this.owner = undefined;
      this.release();
    }
  }
}
