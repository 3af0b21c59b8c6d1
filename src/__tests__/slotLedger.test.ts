import { describe, expect, it } from 'vitest';
import { SlotLedger } from '../engine/slotLedger';
import { SlotStatus } from '../models/Slot';
import { ConflictError } from '../lib/errors';

function ledgerWithSlots(...ids: number[]): SlotLedger {
    const ledger = new SlotLedger(1);
    ids.forEach((id, i) => ledger.addSlot(id, `09:${String(i * 15).padStart(2, '0')}`, 'later'));
    return ledger;
}

describe('SlotLedger', () => {
    it('adds slots as FREE', () => {
        const ledger = new SlotLedger(7);
        const slot = ledger.addSlot(101, '09:00', '09:15');

        expect(slot).toEqual({ id: 101, doctorId: 7, startTime: '09:00', endTime: '09:15', status: SlotStatus.FREE });
        expect(ledger.findSlot(101)?.status).toBe(SlotStatus.FREE);
    });

    it('rejects a duplicate slot id', () => {
        const ledger = ledgerWithSlots(101);
        expect(() => ledger.addSlot(101, '10:00', '10:15')).toThrow(ConflictError);
        expect(ledger.size).toBe(1);
    });

    it('books the most recently added free slot first', () => {
        const ledger = ledgerWithSlots(101, 102, 103);

        expect(ledger.bookNextFree()?.id).toBe(103);
        expect(ledger.bookNextFree()?.id).toBe(102);
        expect(ledger.bookNextFree()?.id).toBe(101);
        expect(ledger.bookNextFree()).toBeNull();
    });

    it('reuses a freed slot ahead of older free ones', () => {
        const ledger = ledgerWithSlots(101, 102);
        ledger.bookNextFree(); // 102
        expect(ledger.cancelSlot(102)).toBe(true);
        expect(ledger.bookNextFree()?.id).toBe(102);
    });

    it('cancelSlot only flips BOOKED slots', () => {
        const ledger = ledgerWithSlots(101);
        expect(ledger.cancelSlot(101)).toBe(false);
        expect(ledger.cancelSlot(999)).toBe(false);

        ledger.bookNextFree();
        expect(ledger.cancelSlot(101)).toBe(true);
        expect(ledger.findSlot(101)?.status).toBe(SlotStatus.FREE);
    });

    it('markBooked only flips FREE slots', () => {
        const ledger = ledgerWithSlots(101);
        expect(ledger.markBooked(101)).toBe(true);
        expect(ledger.markBooked(101)).toBe(false);
        expect(ledger.markBooked(999)).toBe(false);
        expect(ledger.pendingCount()).toBe(1);
    });

    it('reports pending count and next free slot', () => {
        const ledger = ledgerWithSlots(101, 102, 103);
        expect(ledger.pendingCount()).toBe(0);
        expect(ledger.nextFreeSlot()?.id).toBe(103);

        ledger.bookNextFree();
        expect(ledger.pendingCount()).toBe(1);
        expect(ledger.nextFreeSlot()?.id).toBe(102);
        expect(ledger.findSlot(404)).toBeNull();
    });

    it('lists slots in scan order as copies', () => {
        const ledger = ledgerWithSlots(101, 102);
        const listed = ledger.listSlots();

        expect(listed.map(s => s.id)).toEqual([102, 101]);
        listed[0].status = SlotStatus.BOOKED;
        expect(ledger.findSlot(102)?.status).toBe(SlotStatus.FREE);
    });
});
