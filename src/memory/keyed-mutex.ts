/**
 * Per-key exclusive sections.
 *
 * Callers for the same key are chained onto the tail promise of that key and
 * run one at a time in arrival order; distinct keys never wait on each other.
 * The tail is dropped once the last queued section settles.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a running or queued section */
  get activeKeys(): number {
    return this.tails.size;
  }
}
