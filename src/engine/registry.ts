// src/engine/registry.ts

/**
 * Plain key-value storage for registration records, keyed by numeric id.
 * Iteration follows first-insertion order.
 */
export class Registry<T extends { readonly id: number }> {
    private readonly records = new Map<number, T>();

    get size(): number {
        return this.records.size;
    }

    upsert(record: T): T {
        this.records.set(record.id, record);
        return record;
    }

    get(id: number): T | null {
        return this.records.get(id) ?? null;
    }

    has(id: number): boolean {
        return this.records.has(id);
    }

    delete(id: number): boolean {
        return this.records.delete(id);
    }

    values(): T[] {
        return Array.from(this.records.values());
    }
}
