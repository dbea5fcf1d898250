type Release = () => void;

/**
 * Per-key mutual exclusion inside one process. Work for the same key runs strictly
 * one after another, in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  private async acquire(key: string): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: Release = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }

  /** Keys are taken in sorted order so two multi-key callers cannot deadlock. */
  async runExclusive<T>(keys: string[], work: () => Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: Release[] = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await work();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
