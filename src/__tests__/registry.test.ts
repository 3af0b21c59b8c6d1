import { describe, expect, it } from 'vitest';
import { Registry } from '../engine/registry';
import { UndoLog } from '../engine/undoLog';
import { UndoAction } from '../models/UndoRecord';
import { TokenType } from '../models/Token';

describe('Registry', () => {
    it('upserts by id and keeps first-insertion order', () => {
        const registry = new Registry<{ id: number; label: string }>();
        registry.upsert({ id: 2, label: 'b' });
        registry.upsert({ id: 1, label: 'a' });
        registry.upsert({ id: 2, label: 'b2' });

        expect(registry.size).toBe(2);
        expect(registry.get(2)).toEqual({ id: 2, label: 'b2' });
        expect(registry.values().map(r => r.id)).toEqual([2, 1]);
    });

    it('returns null for unknown ids and reports deletes', () => {
        const registry = new Registry<{ id: number }>();
        registry.upsert({ id: 1 });

        expect(registry.get(5)).toBeNull();
        expect(registry.delete(1)).toBe(true);
        expect(registry.delete(1)).toBe(false);
        expect(registry.has(1)).toBe(false);
    });
});

describe('UndoLog', () => {
    const token = {
        id: 1000,
        patientId: 1,
        doctorId: 1,
        slotId: 101,
        type: TokenType.ROUTINE,
        createdAt: new Date('2026-01-05T09:00:00Z')
    };

    it('pops records last-in first-out', () => {
        const log = new UndoLog();
        log.push({ action: UndoAction.BOOK, token });
        log.push({ action: UndoAction.CANCEL, token });

        expect(log.size).toBe(2);
        expect(log.peek()?.action).toBe(UndoAction.CANCEL);
        expect(log.pop()?.action).toBe(UndoAction.CANCEL);
        expect(log.pop()?.action).toBe(UndoAction.BOOK);
        expect(log.pop()).toBeNull();
        expect(log.isEmpty()).toBe(true);
    });
});
