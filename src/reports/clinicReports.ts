// src/reports/clinicReports.ts

import { Token } from '../models/Token';
import { TriageEntry } from '../models/UndoRecord';
import { ClinicContext } from '../engine/clinicContext';

/**
 * Read-only views over clinic state. Nothing here mutates the context.
 */

export interface DoctorReport {
    doctorId: number;
    doctorName: string;
    pendingBookedSlots: number;
    nextFreeSlotId: number | null;
}

export interface ServedVsPending {
    served: number;
    pending: number;
}

export interface PatientFrequency {
    patientId: number;
    count: number;
}

export interface QueueSnapshot {
    routine: Token[];
    triage: TriageEntry[];
}

/**
 * One row per doctor, in registration order
 */
export function reportPerDoctor(ctx: ClinicContext): DoctorReport[] {
    return ctx.doctors.values().map(doctor => {
        const ledger = ctx.ledgers.get(doctor.id);
        return {
            doctorId: doctor.id,
            doctorName: doctor.name,
            pendingBookedSlots: ledger?.pendingCount() ?? 0,
            nextFreeSlotId: ledger?.nextFreeSlot()?.id ?? null
        };
    });
}

export function reportServedVsPending(ctx: ClinicContext): ServedVsPending {
    return {
        served: ctx.served.length,
        pending: ctx.routineQueue.size + ctx.triage.size
    };
}

/**
 * Most frequently served patients
 *
 * Sorted by count, descending. Equal counts keep the order in which the
 * patient first appears in the served history (Array#sort is stable).
 */
export function topKFrequentPatients(ctx: ClinicContext, k = 3): PatientFrequency[] {
    if (k <= 0) {
        return [];
    }

    const counts = new Map<number, number>();
    for (const token of ctx.served) {
        counts.set(token.patientId, (counts.get(token.patientId) ?? 0) + 1);
    }

    return Array.from(counts, ([patientId, count]) => ({ patientId, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, k);
}

export function queueSnapshot(ctx: ClinicContext): QueueSnapshot {
    return {
        routine: ctx.routineQueue.toArray(),
        triage: ctx.triage.toSortedArray()
    };
}
