// Minimal promise-chain mutex per key: calls sharing a key run one at a time.
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  public run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const next = prev.catch(() => undefined).then(fn);
    this.tails.set(key, next);
    return next.finally(() => {
      if (this.tails.get(key) === next) this.tails.delete(key);
    });
  }

  public get pending(): number {
    return this.tails.size;
  }
}
