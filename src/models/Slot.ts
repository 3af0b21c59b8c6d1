// src/models/Slot.ts

/**
 * Slot booking status
 */
export enum SlotStatus {
    FREE = 'FREE',
    BOOKED = 'BOOKED'
}

/**
 * Slot model - one bookable time window of a doctor
 *
 * Data only, no methods. Status flips are handled by the slot ledger.
 *
 * Invariant: a slot referenced by a queued routine token is BOOKED
 * Invariant: served tokens keep their slot BOOKED (only cancellation frees it)
 */
export interface Slot {
    readonly id: number;          // Unique within the owning doctor
    readonly doctorId: number;
    readonly startTime: string;   // Opaque, e.g. "09:00"
    readonly endTime: string;
    status: SlotStatus;
}
