/**
 * Fixed-capacity FIFO backed by a ring buffer. Appending to a full window
 * evicts the oldest entry in constant time.
 */
export class HistoryWindow<T> {
    private buffer: T[];
    private start = 0;
    private count = 0;

    constructor(readonly capacity: number, initial: Iterable<T> = []) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`HistoryWindow capacity must be a positive integer, got ${capacity}`);
        }
        this.buffer = new Array<T>(capacity);
        for (const item of initial) {
            this.push(item);
        }
    }

    get size(): number {
        return this.count;
    }

    /** Returns the evicted entry when the window was already full. */
    push(item: T): T | undefined {
        if (this.count < this.capacity) {
            this.buffer[(this.start + this.count) % this.capacity] = item;
            this.count++;
            return undefined;
        }

        const evicted = this.buffer[this.start];
        this.buffer[this.start] = item;
        this.start = (this.start + 1) % this.capacity;
        return evicted;
    }

    toArray(): T[] {
        const items: T[] = [];
        for (let i = 0; i < this.count; i++) {
            items.push(this.buffer[(this.start + i) % this.capacity]);
        }
        return items;
    }

    /** Most recent `n` entries, oldest first. */
    latest(n: number): T[] {
        const items = this.toArray();
        return n >= items.length ? items : items.slice(items.length - Math.max(n, 0));
    }

    clear(): void {
        this.buffer = new Array<T>(this.capacity);
        this.start = 0;
        this.count = 0;
    }
}
