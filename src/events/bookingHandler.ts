// src/events/bookingHandler.ts

import { Token, TokenType } from '../models/Token';
import { UndoAction } from '../models/UndoRecord';
import { ClinicContext, issueTokenId, ledgerFor } from '../engine/clinicContext';
import { NoFreeSlotError, NotFoundError, QueueFullError } from '../lib/errors';

/**
 * Book a routine visit
 *
 * State transition: CREATED → QUEUED
 *
 * Steps:
 * 1. Validate patient and doctor (fail fast, nothing mutated)
 * 2. Book the doctor's next free slot
 * 3. Enqueue the token; if the queue is full, free the slot again
 * 4. Log a BOOK record for undo
 *
 * @throws NotFoundError unknown patient or doctor
 * @throws NoFreeSlotError doctor has no FREE slot
 * @throws QueueFullError routine queue at capacity (slot rolled back)
 */
export function handleBooking(ctx: ClinicContext, patientId: number, doctorId: number): Token {
    if (!ctx.patients.has(patientId)) {
        throw new NotFoundError(`Patient ${patientId}`);
    }

    const ledger = ledgerFor(ctx, doctorId);
    if (!ledger) {
        throw new NotFoundError(`Doctor ${doctorId}`);
    }

    const slot = ledger.bookNextFree();
    if (!slot) {
        ctx.logger.warn({ patientId, doctorId }, 'booking rejected: no free slot');
        throw new NoFreeSlotError(doctorId);
    }

    if (ctx.routineQueue.isFull()) {
        ledger.cancelSlot(slot.id);
        ctx.logger.warn({ patientId, doctorId, slotId: slot.id }, 'booking rejected: routine queue full');
        throw new QueueFullError(ctx.routineQueue.capacity);
    }

    const token: Token = {
        id: issueTokenId(ctx),
        patientId,
        doctorId,
        slotId: slot.id,
        type: TokenType.ROUTINE,
        createdAt: new Date()
    };
    ctx.routineQueue.enqueue(token);
    ctx.undoLog.push({ action: UndoAction.BOOK, token });

    ctx.logger.info({ tokenId: token.id, patientId, doctorId, slotId: slot.id }, 'routine token booked');
    return token;
}
