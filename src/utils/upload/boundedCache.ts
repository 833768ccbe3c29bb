// src/utils/upload/boundedCache.ts

/**
 * Keyed store holding at most `capacity` entries. When full, inserting a new key
 * drops the key that was inserted first (FIFO). Reads do not refresh an entry.
 */
export class BoundedCache<V> {
    private readonly entries = new Map<string, V>();

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`BoundedCache capacity must be a positive integer, got ${capacity}.`);
        }
    }

    get size(): number {
        return this.entries.size;
    }

    get(key: string): V | undefined {
        return this.entries.get(key);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    set(key: string, value: V): void {
        if (this.entries.has(key)) {
            // Overwrite keeps the original insertion position
            this.entries.set(key, value);
            return;
        }
        if (this.entries.size >= this.capacity) {
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.entries.delete(oldest.value);
            }
        }
        this.entries.set(key, value);
    }

    keys(): string[] {
        return Array.from(this.entries.keys());
    }
}
