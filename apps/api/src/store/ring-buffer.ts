/** Fixed-capacity FIFO: once full, each push overwrites the oldest item. */
export class RingBuffer<T extends {}> {
    private readonly slots: (T | undefined)[];
    private start = 0;
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<T | undefined>(capacity).fill(undefined);
    }

    get size(): number {
        return this.count;
    }

    push(item: T): void {
        this.slots[(this.start + this.count) % this.capacity] = item;
        if (this.count < this.capacity) {
            this.count++;
        } else {
            this.start = (this.start + 1) % this.capacity;
        }
    }

    latest(): T | undefined {
        if (this.count === 0) return undefined;
        return this.slots[(this.start + this.count - 1) % this.capacity];
    }

    /** Oldest first. */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const item = this.slots[(this.start + i) % this.capacity];
            if (item !== undefined) out.push(item);
        }
        return out;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.start = 0;
        this.count = 0;
    }
}
