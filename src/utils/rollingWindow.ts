// --- Fixed-capacity ring buffer, oldest entries overwritten first ---

export class RollingWindow<T> implements Iterable<T> {
    private buffer: (T | undefined)[];
    private pointer = 0;
    private filled = false;
    private readonly _capacity: number;

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 1) {
            throw new RangeError(`RollingWindow size must be >= 1, got ${size}`);
        }
        this._capacity = size;
        this.buffer = new Array<T | undefined>(size);
    }

    public push(value: T): void {
        this.buffer[this.pointer] = value;
        this.pointer = (this.pointer + 1) % this._capacity;
        if (this.pointer === 0) this.filled = true;
    }

    /**
     * Order oldest -> newest
     */
    public toArray(): T[] {
        const ordered = this.filled
            ? this.buffer
                  .slice(this.pointer)
                  .concat(this.buffer.slice(0, this.pointer))
            : this.buffer.slice(0, this.pointer);
        return ordered.filter((value): value is T => value !== undefined);
    }

    /**
     * Order newest -> oldest, at most `limit` entries
     */
    public newest(limit: number = this._capacity): T[] {
        return this.toArray().reverse().slice(0, Math.max(limit, 0));
    }

    public clear(): void {
        this.pointer = 0;
        this.filled = false;
        this.buffer = new Array<T | undefined>(this._capacity);
    }

    public count(): number {
        return this.filled ? this._capacity : this.pointer;
    }

    // Iterable support
    *[Symbol.iterator](): IterableIterator<T> {
        for (const val of this.toArray()) yield val;
    }

    get size(): number {
        return this._capacity;
    }
}
