// src/simulation/runDaySimulation.ts

import { Token } from '../models/Token';
import { ClinicContext, createClinicContext } from '../engine/clinicContext';
import { addDoctor, addSlot, registerPatient } from '../events/registrationHandler';
import { handleBooking } from '../events/bookingHandler';
import { handleCancellation } from '../events/cancellationHandler';
import { handleEmergency } from '../events/emergencyHandler';
import { handleServeNext } from '../events/serviceHandler';
import { handleUndo } from '../events/undoHandler';
import {
    DoctorReport,
    PatientFrequency,
    ServedVsPending,
    reportPerDoctor,
    reportServedVsPending,
    topKFrequentPatients
} from '../reports/clinicReports';
import { createLogger } from '../lib/logger';

/**
 * Scripted OPD day
 *
 * Demonstrates:
 * - Most-recent-first slot booking
 * - Emergency preemption of routine service
 * - Cancellation and undo across queue, heap and slot ledger
 * - Reports after each phase
 */

export interface SimulationSummary {
    servedTokenIds: number[];
    doctors: DoctorReport[];
    servedVsPending: ServedVsPending;
    topPatients: PatientFrequency[];
    undoMessages: string[];
}

// Logging helpers
function log(message: string): void {
    console.log(`[${new Date().toISOString()}] ${message}`);
}

function logSection(title: string): void {
    console.log('\n' + '='.repeat(80));
    console.log(title);
    console.log('='.repeat(80) + '\n');
}

function describeToken(token: Token | null): string {
    if (!token) {
        return 'nobody waiting';
    }
    const slot = token.slotId !== null ? `slot ${token.slotId}` : 'no slot';
    return `token ${token.id} (patient ${token.patientId}, ${token.type}, ${slot})`;
}

function logReports(ctx: ClinicContext): void {
    for (const row of reportPerDoctor(ctx)) {
        log(`  ${row.doctorName}: ${row.pendingBookedSlots} booked, next free: ${row.nextFreeSlotId ?? 'none'}`);
    }
    const { served, pending } = reportServedVsPending(ctx);
    log(`  Served: ${served}, pending: ${pending}`);
}

export function runSimulation(ctx: ClinicContext = createClinicContext({
    queueCapacity: 20,
    logger: createLogger({ name: 'simulation', level: 'warn' })
})): SimulationSummary {
    const servedTokenIds: number[] = [];
    const undoMessages: string[] = [];

    const serve = (): void => {
        const token = handleServeNext(ctx);
        if (token) {
            servedTokenIds.push(token.id);
        }
        log(`Served: ${describeToken(token)}`);
    };

    const undo = (): void => {
        const result = handleUndo(ctx);
        undoMessages.push(result.message);
        log(`Undo: ${result.message}`);
    };

    logSection('OPD DAY SIMULATION - START');

    // ========== STEP 1: Doctors and slots ==========
    logSection('STEP 1: Creating Doctors and Slots');

    addDoctor(ctx, { id: 1, name: 'Dr. Rao', specialization: 'General Medicine' });
    addDoctor(ctx, { id: 2, name: 'Dr. Mehta', specialization: 'Cardiology' });
    addSlot(ctx, 1, { slotId: 101, startTime: '09:00', endTime: '09:15' });
    addSlot(ctx, 1, { slotId: 102, startTime: '09:15', endTime: '09:30' });
    addSlot(ctx, 2, { slotId: 201, startTime: '10:00', endTime: '10:15' });
    addSlot(ctx, 2, { slotId: 202, startTime: '10:15', endTime: '10:30' });
    log(`Created ${ctx.doctors.size} doctors with ${ctx.ledgers.get(1)?.size ?? 0} + ${ctx.ledgers.get(2)?.size ?? 0} slots`);

    // ========== STEP 2: Patients ==========
    logSection('STEP 2: Registering Patients');

    registerPatient(ctx, { id: 1, name: 'Alice', age: 30 });
    registerPatient(ctx, { id: 2, name: 'Bob', age: 45 });
    registerPatient(ctx, { id: 3, name: 'Charlie', age: 25 });
    registerPatient(ctx, { id: 4, name: 'Dana', age: 52 });
    log(`Registered ${ctx.patients.size} patients`);

    // ========== STEP 3: Routine bookings ==========
    logSection('STEP 3: Routine Bookings');

    log(`Booked: ${describeToken(handleBooking(ctx, 1, 1))}`);
    log(`Booked: ${describeToken(handleBooking(ctx, 2, 1))}`);
    const dana = handleBooking(ctx, 4, 2);
    log(`Booked: ${describeToken(dana)}`);

    // ========== STEP 4: Cancellation and undo ==========
    logSection('STEP 4: Cancellation and Undo');

    log(`Cancelled token ${dana.id}: ${handleCancellation(ctx, dana.id)}`);
    undo();

    // ========== STEP 5: Emergency ==========
    logSection('STEP 5: Emergency Insertion');

    log(`Triaged: ${describeToken(handleEmergency(ctx, 3, 2, 1))}`);

    // ========== STEP 6: Service ==========
    logSection('STEP 6: Serving Patients');

    serve();
    serve();
    logReports(ctx);

    // ========== STEP 7: Undo last service ==========
    logSection('STEP 7: Undo Last Service');

    undo();
    servedTokenIds.pop();
    logReports(ctx);

    logSection('SIMULATION SUMMARY');

    const summary: SimulationSummary = {
        servedTokenIds,
        doctors: reportPerDoctor(ctx),
        servedVsPending: reportServedVsPending(ctx),
        topPatients: topKFrequentPatients(ctx, 3),
        undoMessages
    };
    log(`Top patients: ${summary.topPatients.map(p => `${p.patientId} x${p.count}`).join(', ') || 'none'}`);

    logSection('SIMULATION COMPLETE');
    return summary;
}
