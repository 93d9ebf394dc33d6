// Process-lifetime caches for upstream data that does not change between requests

export interface ProcessCache<T> {
  get(): Promise<T>;
  clear(): void;
}

/**
 * Wraps a loader so it runs at most once per process. Concurrent callers share
 * the in-flight request; a failed load is forgotten so the next call retries.
 */
export function cacheForProcess<T>(load: () => Promise<T>): ProcessCache<T> {
  let pending: Promise<T> | null = null;

  return {
    get() {
      if (!pending) {
        const request = load().catch((err: unknown) => {
          if (pending === request) pending = null;
          throw err;
        });
        pending = request;
      }
      return pending;
    },
    clear() {
      pending = null;
    },
  };
}
