// src/events/cancellationHandler.ts

import { UndoAction } from '../models/UndoRecord';
import { ClinicContext, ledgerFor } from '../engine/clinicContext';

/**
 * Handle patient cancellation of a routine booking
 *
 * State transition: QUEUED → CANCELLED
 *
 * Side effects:
 * 1. Token leaves the routine queue (order of the others preserved)
 * 2. Its slot is freed
 * 3. A CANCEL record is logged for undo
 *
 * @returns False when the token is not waiting in the routine queue
 */
export function handleCancellation(ctx: ClinicContext, tokenId: number): boolean {
    const token = ctx.routineQueue.removeFirst(t => t.id === tokenId);
    if (!token) {
        return false;
    }

    if (token.slotId !== null) {
        ledgerFor(ctx, token.doctorId)?.cancelSlot(token.slotId);
    }
    ctx.undoLog.push({ action: UndoAction.CANCEL, token });

    ctx.logger.info({ tokenId, slotId: token.slotId }, 'routine token cancelled');
    return true;
}
