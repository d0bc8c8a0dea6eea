/**
 * TTL cache with read-through loading. Used for expiry lookups so the
 * scanner does not hit the upstream instrument list on every tick.
 */
export class TimeAwareCache<K, V> {
    private cache = new Map<K, { value: V; timestamp: number }>();
    private pending = new Map<K, Promise<V>>();

    constructor(
        private readonly ttl: number,
        private readonly now: () => number = Date.now
    ) {}

    set(key: K, value: V): void {
        this.cache.set(key, { value, timestamp: this.now() });
    }

    get(key: K): V | undefined {
        const entry = this.cache.get(key);
        if (!entry) return undefined;
        if (this.now() - entry.timestamp > this.ttl) {
            this.cache.delete(key);
            return undefined;
        }
        return entry.value;
    }

    has(key: K): boolean {
        return this.get(key) !== undefined;
    }

    /**
     * Return the cached value or load it once; concurrent callers for the
     * same key share one load. Failed loads are not cached.
     */
    async getOrLoad(key: K, loader: (key: K) => Promise<V>): Promise<V> {
        const cached = this.get(key);
        if (cached !== undefined) return cached;

        const inFlight = this.pending.get(key);
        if (inFlight) return inFlight;

        const load = loader(key)
            .then((value) => {
                this.set(key, value);
                return value;
            })
            .finally(() => {
                this.pending.delete(key);
            });
        this.pending.set(key, load);
        return load;
    }

    delete(key: K): void {
        this.cache.delete(key);
    }

    clear(): void {
        this.cache.clear();
    }

    size(): number {
        return this.cache.size;
    }
}
