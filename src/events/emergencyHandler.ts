// src/events/emergencyHandler.ts

import { Token, TokenType, UNASSIGNED_DOCTOR_ID } from '../models/Token';
import { UndoAction } from '../models/UndoRecord';
import { ClinicContext, issueTokenId } from '../engine/clinicContext';

/**
 * Insert an emergency token into triage
 *
 * State transition: CREATED → TRIAGED
 *
 * The heap is unbounded, so this never fails for a valid integer severity.
 * No slot is booked; the doctor may be assigned later.
 *
 * @param severity Lower = more urgent
 * @param doctorId Optional preassigned doctor
 */
export function handleEmergency(
    ctx: ClinicContext,
    patientId: number,
    severity: number,
    doctorId?: number
): Token {
    const token: Token = {
        id: issueTokenId(ctx),
        patientId,
        doctorId: doctorId ?? UNASSIGNED_DOCTOR_ID,
        slotId: null,
        type: TokenType.EMERGENCY,
        createdAt: new Date()
    };

    ctx.triage.insert(token, severity);
    ctx.undoLog.push({ action: UndoAction.TRIAGE_INSERT, token, severity });

    ctx.logger.info({ tokenId: token.id, patientId, severity, doctorId: token.doctorId }, 'emergency token triaged');
    return token;
}
