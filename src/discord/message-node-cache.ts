// Bounded in-memory map from message id to a resolved node.
// Concurrent lookups for one id share a single load; entries leave in
// insertion order once the capacity is exceeded.

export const DEFAULT_CACHE_CAPACITY = 500;
export const DEFAULT_LOAD_TIMEOUT_MS = 30_000;

export class NodeLoadTimeoutError extends Error {
  constructor(readonly messageId: string, readonly timeoutMs: number) {
    super(`Resolving message ${messageId} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

type Entry<N> =
  | { state: 'pending'; promise: Promise<N>; settle?: (node: N) => void }
  | { state: 'resolved'; node: N }
  | { state: 'failed'; error: unknown };

export type CacheEntryState = Entry<unknown>['state'];

export type MessageNodeCacheOptions = {
  capacity?: number;
  loadTimeoutMs?: number;
};

export class MessageNodeCache<N> {
  private readonly entries = new Map<string, Entry<N>>();
  private readonly capacity: number;
  private readonly loadTimeoutMs: number;

  constructor(opts: MessageNodeCacheOptions = {}) {
    this.capacity = Math.max(1, opts.capacity ?? DEFAULT_CACHE_CAPACITY);
    this.loadTimeoutMs = opts.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Resolved node for `id`, if any. Never triggers a load. */
  peek(id: string): N | undefined {
    const entry = this.entries.get(id);
    return entry?.state === 'resolved' ? entry.node : undefined;
  }

  state(id: string): CacheEntryState | undefined {
    return this.entries.get(id)?.state;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  /**
   * Return the cached node for `id`, or run `load` once and share its result
   * with every caller that arrives while it is in flight. A failed entry is
   * retried by the next call.
   */
  getOrResolve(id: string, load: () => Promise<N>): Promise<N> {
    const existing = this.entries.get(id);
    if (existing?.state === 'resolved') return Promise.resolve(existing.node);
    if (existing?.state === 'pending') return existing.promise;

    const promise = withTimeout(load(), this.loadTimeoutMs, id);
    const entry: Entry<N> = { state: 'pending', promise };
    this.track(id, entry, promise);
    return promise;
  }

  /**
   * Register a node whose content is still being produced (an outgoing
   * streamed reply). Lookups wait for `complete`; the reservation fails if
   * it is not completed within `timeoutMs`.
   */
  reserve(id: string, timeoutMs: number = this.loadTimeoutMs): void {
    let settle: ((node: N) => void) | undefined;
    const pending = new Promise<N>((resolve) => {
      settle = resolve;
    });
    const promise = withTimeout(pending, timeoutMs, id);
    const entry: Entry<N> = { state: 'pending', promise, settle };
    this.track(id, entry, promise);
  }

  /** Finish a reservation, or store a node outright when none exists. */
  complete(id: string, node: N): void {
    const entry = this.entries.get(id);
    if (entry?.state === 'pending' && entry.settle) {
      entry.settle(node);
      return;
    }
    this.insert(id, { state: 'resolved', node });
  }

  private track(id: string, entry: Entry<N>, promise: Promise<N>): void {
    this.insert(id, entry);
    promise.then(
      (node) => {
        if (this.entries.get(id) === entry) this.entries.set(id, { state: 'resolved', node });
      },
      (error: unknown) => {
        if (this.entries.get(id) === entry) this.entries.set(id, { state: 'failed', error });
      },
    );
  }

  private insert(id: string, entry: Entry<N>): void {
    // Re-setting an existing key keeps its original insertion position.
    this.entries.set(id, entry);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

function withTimeout<N>(promise: Promise<N>, timeoutMs: number, id: string): Promise<N> {
  return new Promise<N>((resolve, reject) => {
    const timer = setTimeout(() => reject(new NodeLoadTimeoutError(id, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
