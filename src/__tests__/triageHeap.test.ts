import { describe, expect, it } from 'vitest';
import { TriageHeap } from '../engine/triageHeap';
import { Token, TokenType } from '../models/Token';
import { ValidationError } from '../lib/errors';

function emergency(id: number, patientId = id): Token {
    return {
        id,
        patientId,
        doctorId: -1,
        slotId: null,
        type: TokenType.EMERGENCY,
        createdAt: new Date('2026-01-05T09:00:00Z')
    };
}

function drain(heap: TriageHeap): number[] {
    const ids: number[] = [];
    let entry = heap.extractMin();
    while (entry) {
        ids.push(entry.token.id);
        entry = heap.extractMin();
    }
    return ids;
}

describe('TriageHeap', () => {
    it('extracts the lowest severity first', () => {
        const heap = new TriageHeap();
        heap.insert(emergency(1), 5);
        heap.insert(emergency(2), 1);
        heap.insert(emergency(3), 3);

        expect(drain(heap)).toEqual([2, 3, 1]);
        expect(heap.extractMin()).toBeNull();
    });

    it('breaks severity ties by insertion order', () => {
        const heap = new TriageHeap();
        heap.insert(emergency(10), 2); // A
        heap.insert(emergency(11), 2); // B
        heap.insert(emergency(12), 1); // C

        expect(drain(heap)).toEqual([12, 10, 11]);
    });

    it('keeps FIFO among many equal severities', () => {
        const heap = new TriageHeap();
        for (let id = 1; id <= 8; id++) {
            heap.insert(emergency(id), 4);
        }
        expect(drain(heap)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    });

    it('assigns strictly increasing sequence numbers', () => {
        const heap = new TriageHeap();
        const first = heap.insert(emergency(1), 3);
        const second = heap.insert(emergency(2), 0);

        expect(first.sequence).toBe(0);
        expect(second.sequence).toBe(1);
        expect(second.severity).toBe(0);
        expect(second.token.id).toBe(2);
    });

    it('peek returns the minimum without removing it', () => {
        const heap = new TriageHeap();
        expect(heap.peek()).toBeNull();
        heap.insert(emergency(1), 2);
        heap.insert(emergency(2), 1);

        expect(heap.peek()?.token.id).toBe(2);
        expect(heap.size).toBe(2);
    });

    it('restore puts an entry back at its original priority', () => {
        const heap = new TriageHeap();
        heap.insert(emergency(1), 2);
        heap.insert(emergency(2), 2);
        const first = heap.extractMin();
        expect(first?.token.id).toBe(1);

        heap.insert(emergency(3), 2);
        if (first) {
            heap.restore(first);
        }
        expect(drain(heap)).toEqual([1, 2, 3]);
    });

    it('removeByTokenId rebuilds the heap without the token', () => {
        const heap = new TriageHeap();
        heap.insert(emergency(1), 3);
        heap.insert(emergency(2), 1);
        heap.insert(emergency(3), 2);

        expect(heap.removeByTokenId(2)?.severity).toBe(1);
        expect(heap.removeByTokenId(99)).toBeNull();
        expect(heap.size).toBe(2);
        expect(drain(heap)).toEqual([3, 1]);
    });

    it('lists entries in service order without mutating', () => {
        const heap = new TriageHeap();
        heap.insert(emergency(1), 3);
        heap.insert(emergency(2), 0);
        heap.insert(emergency(3), 3);

        expect(heap.toSortedArray().map(e => e.token.id)).toEqual([2, 1, 3]);
        expect(heap.size).toBe(3);
    });

    it('rejects a non-integer severity', () => {
        const heap = new TriageHeap();
        expect(() => heap.insert(emergency(1), 1.5)).toThrow(ValidationError);
        expect(() => heap.insert(emergency(1), Number.NaN)).toThrow(ValidationError);
        expect(heap.isEmpty()).toBe(true);
    });
});
