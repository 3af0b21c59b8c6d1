// src/engine/slotLedger.ts

import { Slot, SlotStatus } from '../models/Slot';
import { ConflictError } from '../lib/errors';

/**
 * Per-doctor slot ledger
 *
 * Slots are kept in an ordered array plus an index by slot id.
 * Scan order is most-recently-added first: the newest FREE slot is booked
 * before older ones. This is a deliberate booking policy.
 *
 * Slots are never deleted; they only flip FREE <-> BOOKED.
 */
export class SlotLedger {
    private readonly slots: Slot[] = [];  // Insertion order; scanned from the end
    private readonly index = new Map<number, Slot>();

    constructor(readonly doctorId: number) {}

    get size(): number {
        return this.slots.length;
    }

    addSlot(slotId: number, startTime: string, endTime: string): Slot {
        if (this.index.has(slotId)) {
            throw new ConflictError(`Slot ${slotId} already exists for doctor ${this.doctorId}`);
        }

        const slot: Slot = {
            id: slotId,
            doctorId: this.doctorId,
            startTime,
            endTime,
            status: SlotStatus.FREE
        };
        this.slots.push(slot);
        this.index.set(slotId, slot);
        return slot;
    }

    /**
     * Book the first FREE slot in scan order
     *
     * @returns The booked slot, or null when every slot is taken
     */
    bookNextFree(): Slot | null {
        const slot = this.nextFreeSlot();
        if (!slot) {
            return null;
        }
        slot.status = SlotStatus.BOOKED;
        return slot;
    }

    /**
     * Flip a BOOKED slot back to FREE
     *
     * @returns False if the slot is missing or already FREE
     */
    cancelSlot(slotId: number): boolean {
        const slot = this.index.get(slotId);
        if (!slot || slot.status !== SlotStatus.BOOKED) {
            return false;
        }
        slot.status = SlotStatus.FREE;
        return true;
    }

    /**
     * Flip a specific FREE slot to BOOKED (used when a cancellation is undone)
     */
    markBooked(slotId: number): boolean {
        const slot = this.index.get(slotId);
        if (!slot || slot.status !== SlotStatus.FREE) {
            return false;
        }
        slot.status = SlotStatus.BOOKED;
        return true;
    }

    findSlot(slotId: number): Slot | null {
        return this.index.get(slotId) ?? null;
    }

    pendingCount(): number {
        return this.slots.filter(slot => slot.status === SlotStatus.BOOKED).length;
    }

    nextFreeSlot(): Slot | null {
        for (let i = this.slots.length - 1; i >= 0; i--) {
            if (this.slots[i].status === SlotStatus.FREE) {
                return this.slots[i];
            }
        }
        return null;
    }

    /**
     * Slots in scan order (copies, safe to serialize)
     */
    listSlots(): Slot[] {
        return [...this.slots].reverse().map(slot => ({ ...slot }));
    }
}
