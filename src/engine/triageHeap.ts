// src/engine/triageHeap.ts

import { Token } from '../models/Token';
import { TriageEntry } from '../models/UndoRecord';
import { ValidationError } from '../lib/errors';

/**
 * Min-heap of emergency tokens
 *
 * Lower severity = more urgent. Equal severities are served in insertion
 * order via a strictly increasing sequence number that is never handed out twice.
 *
 * Performance:
 * - insert / extractMin / restore: O(log n)
 * - peek: O(1)
 * - removeByTokenId: O(n log n) full rebuild (triage volumes are small)
 */
export class TriageHeap {
    private heap: TriageEntry[] = [];
    private nextSequence = 0;

    get size(): number {
        return this.heap.length;
    }

    isEmpty(): boolean {
        return this.heap.length === 0;
    }

    insert(token: Token, severity: number): TriageEntry {
        if (!Number.isInteger(severity)) {
            throw new ValidationError(`Severity must be an integer, got ${severity}`);
        }

        const entry: TriageEntry = { token, severity, sequence: this.nextSequence++ };
        this.push(entry);
        return entry;
    }

    /**
     * Put back an entry previously taken out of this heap,
     * keeping its original severity and place in the tie order
     */
    restore(entry: TriageEntry): void {
        this.push(entry);
    }

    extractMin(): TriageEntry | null {
        if (this.heap.length === 0) {
            return null;
        }

        const top = this.heap[0];
        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }
        return top;
    }

    peek(): TriageEntry | null {
        return this.heap.length > 0 ? this.heap[0] : null;
    }

    /**
     * Remove the entry holding the given token
     *
     * Pops every entry, keeps the non-matching ones and re-heapifies them.
     */
    removeByTokenId(tokenId: number): TriageEntry | null {
        let removed: TriageEntry | null = null;
        const kept: TriageEntry[] = [];

        let entry = this.extractMin();
        while (entry !== null) {
            if (removed === null && entry.token.id === tokenId) {
                removed = entry;
            } else {
                kept.push(entry);
            }
            entry = this.extractMin();
        }

        this.heap = kept;
        this.heapify();
        return removed;
    }

    /**
     * Entries in the order they would be served
     */
    toSortedArray(): TriageEntry[] {
        return [...this.heap].sort(compareEntries);
    }

    private push(entry: TriageEntry): void {
        this.heap.push(entry);
        this.siftUp(this.heap.length - 1);
    }

    private heapify(): void {
        for (let i = Math.floor(this.heap.length / 2) - 1; i >= 0; i--) {
            this.siftDown(i);
        }
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = Math.floor((child - 1) / 2);
            if (compareEntries(this.heap[child], this.heap[parent]) >= 0) {
                break;
            }
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        const length = this.heap.length;
        let parent = index;

        while (true) {
            const left = 2 * parent + 1;
            const right = left + 1;
            let smallest = parent;

            if (left < length && compareEntries(this.heap[left], this.heap[smallest]) < 0) {
                smallest = left;
            }
            if (right < length && compareEntries(this.heap[right], this.heap[smallest]) < 0) {
                smallest = right;
            }
            if (smallest === parent) {
                break;
            }

            this.swap(parent, smallest);
            parent = smallest;
        }
    }

    private swap(a: number, b: number): void {
        const tmp = this.heap[a];
        this.heap[a] = this.heap[b];
        this.heap[b] = tmp;
    }
}

function compareEntries(a: TriageEntry, b: TriageEntry): number {
    if (a.severity !== b.severity) {
        return a.severity - b.severity;
    }
    return a.sequence - b.sequence;
}
