// ── Keyed Mutex: one turn per user at a time ────────────

/**
 * Promise-chain lock keyed by string. Calls sharing a key run strictly in
 * arrival order; different keys never wait on each other. A key's entry
 * is dropped once its chain drains.
 */
export class KeyedMutex {
  private readonly chains = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }

  /** Whether a turn for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.chains.has(key);
  }

  get size(): number {
    return this.chains.size;
  }
}
