// src/engine/undoLog.ts

import { UndoRecord } from '../models/UndoRecord';

/**
 * LIFO log of reversible actions. push/pop O(1).
 */
export class UndoLog {
    private readonly records: UndoRecord[] = [];

    get size(): number {
        return this.records.length;
    }

    isEmpty(): boolean {
        return this.records.length === 0;
    }

    push(record: UndoRecord): void {
        this.records.push(record);
    }

    pop(): UndoRecord | null {
        return this.records.pop() ?? null;
    }

    peek(): UndoRecord | null {
        return this.records.length > 0 ? this.records[this.records.length - 1] : null;
    }
}
