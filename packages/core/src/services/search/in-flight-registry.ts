export interface InFlightRegistry<T> {
  joinOrStart(key: string, factory: () => Promise<T>): Promise<T>;
  has(key: string): boolean;
  size(): number;
}

/**
 * Shares one pending resolution between every concurrent caller of a key.
 * The entry is registered before the factory runs and removed once it
 * settles, so nothing is retained after completion.
 */
export function createInFlightRegistry<T>(): InFlightRegistry<T> {
  const pending = new Map<string, Promise<T>>();

  return {
    joinOrStart(key: string, factory: () => Promise<T>): Promise<T> {
      const existing = pending.get(key);
      if (existing) {
        return existing;
      }

      const resolution: Promise<T> = Promise.resolve()
        .then(factory)
        .finally(() => {
          if (pending.get(key) === resolution) {
            pending.delete(key);
          }
        });
      pending.set(key, resolution);
      return resolution;
    },

    has(key: string): boolean {
      return pending.has(key);
    },

    size(): number {
      return pending.size;
    },
  };
}
