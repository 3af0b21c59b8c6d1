// src/events/serviceHandler.ts

import { Token } from '../models/Token';
import { UndoAction } from '../models/UndoRecord';
import { ClinicContext } from '../engine/clinicContext';

/**
 * Serve the next patient
 *
 * Emergency strictly preempts routine: the routine queue is only
 * consulted when the triage heap is empty. The served token's slot stays BOOKED.
 *
 * @returns Served token, or null when nobody is waiting
 */
export function handleServeNext(ctx: ClinicContext): Token | null {
    const entry = ctx.triage.extractMin();
    if (entry) {
        ctx.served.push(entry.token);
        ctx.undoLog.push({ action: UndoAction.SERVE_TRIAGE, token: entry.token, entry });
        ctx.logger.info({ tokenId: entry.token.id, severity: entry.severity }, 'emergency token served');
        return entry.token;
    }

    const token = ctx.routineQueue.dequeue();
    if (!token) {
        return null;
    }

    ctx.served.push(token);
    ctx.undoLog.push({ action: UndoAction.SERVE_ROUTINE, token });
    ctx.logger.info({ tokenId: token.id, slotId: token.slotId }, 'routine token served');
    return token;
}
