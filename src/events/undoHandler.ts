// src/events/undoHandler.ts

import { Token } from '../models/Token';
import { UndoAction, UndoRecord, UndoResult } from '../models/UndoRecord';
import { ClinicContext, ledgerFor } from '../engine/clinicContext';
import { InvalidActionError } from '../lib/errors';

/**
 * Revert the most recent logged action
 *
 * One record per call; repeated calls unwind further back.
 * An empty log is a no-op, not an error.
 *
 * @throws InvalidActionError record cannot be inverted (logic defect)
 */
export function handleUndo(ctx: ClinicContext): UndoResult {
    const record = ctx.undoLog.pop();
    if (!record) {
        return { undone: false, action: null, tokenId: null, message: 'Nothing to undo' };
    }

    const result = invert(ctx, record);
    ctx.logger.info({ action: record.action, tokenId: record.token.id, undone: result.undone }, 'undo applied');
    return result;
}

function invert(ctx: ClinicContext, record: UndoRecord): UndoResult {
    const { token } = record;

    switch (record.action) {
        case UndoAction.BOOK: {
            const removed = ctx.routineQueue.removeFirst(t => t.id === token.id);
            freeSlot(ctx, token);
            return outcome(record, removed !== null,
                removed ? `Undid booking token ${token.id}` : `Could not find token ${token.id} to undo`);
        }

        case UndoAction.CANCEL: {
            assertQueueRoom(ctx, token);
            rebookSlot(ctx, token);
            ctx.routineQueue.enqueue(token);
            return outcome(record, true, `Undid cancellation: rebooked token ${token.id}`);
        }

        case UndoAction.SERVE_ROUTINE: {
            assertQueueRoom(ctx, token);
            removeFromServed(ctx, token.id);
            // Served tokens always come off the head, so that is where it goes back
            ctx.routineQueue.pushFront(token);
            return outcome(record, true, `Undid serving of routine token ${token.id}`);
        }

        case UndoAction.SERVE_TRIAGE: {
            removeFromServed(ctx, token.id);
            ctx.triage.restore(record.entry);
            return outcome(record, true, `Undid serving of triage token ${token.id}`);
        }

        case UndoAction.TRIAGE_INSERT: {
            const removed = ctx.triage.removeByTokenId(token.id);
            return outcome(record, removed !== null,
                removed ? `Undid triage insert ${token.id}` : `Could not find triage token ${token.id} to undo`);
        }

        default: {
            const unknown: never = record;
            throw new InvalidActionError(`Unknown undo record: ${JSON.stringify(unknown)}`);
        }
    }
}

function outcome(record: UndoRecord, undone: boolean, message: string): UndoResult {
    return { undone, action: record.action, tokenId: record.token.id, message };
}

// Unreachable while records are inverted strictly last-in first-out
function assertQueueRoom(ctx: ClinicContext, token: Token): void {
    if (ctx.routineQueue.isFull()) {
        throw new InvalidActionError(`Cannot restore token ${token.id}: routine queue full`);
    }
}

function freeSlot(ctx: ClinicContext, token: Token): void {
    if (token.slotId !== null) {
        ledgerFor(ctx, token.doctorId)?.cancelSlot(token.slotId);
    }
}

function rebookSlot(ctx: ClinicContext, token: Token): void {
    if (token.slotId !== null) {
        ledgerFor(ctx, token.doctorId)?.markBooked(token.slotId);
    }
}

/**
 * Drop the most recent served entry for this token
 */
function removeFromServed(ctx: ClinicContext, tokenId: number): void {
    for (let i = ctx.served.length - 1; i >= 0; i--) {
        if (ctx.served[i].id === tokenId) {
            ctx.served.splice(i, 1);
            return;
        }
    }
}
