// src/engine/boundedQueue.ts

import { ValidationError } from '../lib/errors';

/**
 * Fixed-capacity FIFO queue over a ring buffer
 *
 * Holds routine tokens in arrival order.
 *
 * Performance:
 * - enqueue / dequeue / pushFront / peek: O(1)
 * - removeFirst: O(n) drain and rebuild
 */
export class BoundedQueue<T> {
    private readonly items: Array<T | undefined>;
    private head = 0;
    private tail = 0;
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new ValidationError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
        this.items = new Array<T | undefined>(capacity).fill(undefined);
    }

    get size(): number {
        return this.count;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    isFull(): boolean {
        return this.count === this.capacity;
    }

    /**
     * Append at the tail
     *
     * @returns False (and no mutation) when the queue is at capacity
     */
    enqueue(item: T): boolean {
        if (this.isFull()) {
            return false;
        }

        this.items[this.tail] = item;
        this.tail = (this.tail + 1) % this.capacity;
        this.count++;
        return true;
    }

    /**
     * Insert ahead of the current head, so the item is the next one out
     */
    pushFront(item: T): boolean {
        if (this.isFull()) {
            return false;
        }

        this.head = (this.head - 1 + this.capacity) % this.capacity;
        this.items[this.head] = item;
        this.count++;
        return true;
    }

    dequeue(): T | null {
        if (this.count === 0) {
            return null;
        }

        const item = this.items[this.head];
        this.items[this.head] = undefined;
        this.head = (this.head + 1) % this.capacity;
        this.count--;
        return item ?? null;
    }

    peek(): T | null {
        if (this.count === 0) {
            return null;
        }
        return this.items[this.head] ?? null;
    }

    /**
     * Remove the first item matching the predicate
     *
     * Drains the queue once and re-enqueues every other item,
     * so relative order of the survivors is preserved.
     *
     * @returns The removed item, or null if nothing matched
     */
    removeFirst(predicate: (item: T) => boolean): T | null {
        let removed: T | null = null;
        const survivors: T[] = [];

        const size = this.count;
        for (let i = 0; i < size; i++) {
            const item = this.dequeue();
            if (item === null) {
                break;
            }
            if (removed === null && predicate(item)) {
                removed = item;
            } else {
                survivors.push(item);
            }
        }

        // Cannot overflow: survivors.length <= size <= capacity
        for (const item of survivors) {
            this.enqueue(item);
        }

        return removed;
    }

    /**
     * Head-to-tail copy of the queue contents
     */
    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const item = this.items[(this.head + i) % this.capacity];
            if (item !== undefined) {
                result.push(item);
            }
        }
        return result;
    }
}
