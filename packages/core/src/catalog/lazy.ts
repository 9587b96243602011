/**
 * Initialize-once async cell.
 *
 * Concurrent get() calls share a single in-flight initialization, so the
 * initializer never runs twice at the same time. A failed initialization
 * is not memoized: the next get() starts over.
 */
export class LazyCell<T> {
  private value: { current: T } | null = null;
  private inFlight: Promise<T> | null = null;

  constructor(private readonly init: () => Promise<T>) {}

  get(): Promise<T> {
    if (this.value) return Promise.resolve(this.value.current);
    if (this.inFlight) return this.inFlight;

    const pending = this.init().then(
      (resolved) => {
        this.value = { current: resolved };
        this.inFlight = null;
        return resolved;
      },
      (error: unknown) => {
        this.inFlight = null;
        throw error;
      },
    );
    this.inFlight = pending;
    return pending;
  }

  /** The resolved value, if initialization has completed. */
  peek(): T | undefined {
    return this.value?.current;
  }
}
