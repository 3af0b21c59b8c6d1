// src/models/Token.ts

/**
 * Visit request types
 */
export enum TokenType {
    ROUTINE = 'ROUTINE',      // Booked against a slot, served in arrival order
    EMERGENCY = 'EMERGENCY'   // Triaged by severity, preempts routine service
}

/**
 * Doctor id carried by emergency tokens with no doctor assigned yet
 */
export const UNASSIGNED_DOCTOR_ID = -1;

/**
 * Token model - represents one patient visit request
 *
 * Data only, no methods. Tokens are immutable once issued; they move
 * between the routine queue, the triage heap and the served list.
 *
 * Lifecycle:
 * - CREATED → QUEUED (routine) | TRIAGED (emergency)
 * - QUEUED | TRIAGED → SERVED
 * - QUEUED → CANCELLED → QUEUED (via undo)
 */
export interface Token {
    readonly id: number;
    readonly patientId: number;
    readonly doctorId: number;
    readonly slotId: number | null;  // Only set for routine bookings
    readonly type: TokenType;
    readonly createdAt: Date;
}
