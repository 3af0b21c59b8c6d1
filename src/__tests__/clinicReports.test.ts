import { describe, expect, it } from 'vitest';
import { createClinicContext } from '../engine/clinicContext';
import { addDoctor, addSlot, registerPatient } from '../events/registrationHandler';
import { handleBooking } from '../events/bookingHandler';
import { handleEmergency } from '../events/emergencyHandler';
import { handleServeNext } from '../events/serviceHandler';
import { queueSnapshot, reportPerDoctor, reportServedVsPending, topKFrequentPatients } from '../reports/clinicReports';

describe('topKFrequentPatients', () => {
    it('ranks patients by how often they were served', () => {
        const ctx = createClinicContext();
        // Y first, then X three times
        for (const patientId of [20, 10, 10, 10]) {
            handleEmergency(ctx, patientId, 1);
            handleServeNext(ctx);
        }

        expect(topKFrequentPatients(ctx, 2)).toEqual([
            { patientId: 10, count: 3 },
            { patientId: 20, count: 1 }
        ]);
    });

    it('breaks ties by first appearance in the served history', () => {
        const ctx = createClinicContext();
        for (const patientId of [7, 5, 9, 5, 7]) {
            handleEmergency(ctx, patientId, 0);
            handleServeNext(ctx);
        }

        expect(topKFrequentPatients(ctx, 3)).toEqual([
            { patientId: 7, count: 2 },
            { patientId: 5, count: 2 },
            { patientId: 9, count: 1 }
        ]);
        expect(topKFrequentPatients(ctx, 1)).toEqual([{ patientId: 7, count: 2 }]);
    });

    it('returns nothing for k <= 0 or an empty history', () => {
        const ctx = createClinicContext();
        expect(topKFrequentPatients(ctx, 3)).toEqual([]);

        handleEmergency(ctx, 1, 0);
        handleServeNext(ctx);
        expect(topKFrequentPatients(ctx, 0)).toEqual([]);
    });
});

describe('doctor and queue reports', () => {
    it('summarises each doctor in registration order', () => {
        const ctx = createClinicContext();
        addDoctor(ctx, { id: 2, name: 'Dr. Second', specialization: 'Cardio' });
        addDoctor(ctx, { id: 1, name: 'Dr. First', specialization: 'General' });
        addSlot(ctx, 1, { slotId: 101, startTime: '09:00', endTime: '09:15' });
        addSlot(ctx, 1, { slotId: 102, startTime: '09:15', endTime: '09:30' });
        registerPatient(ctx, { id: 1, name: 'Someone', age: 50 });
        handleBooking(ctx, 1, 1);

        expect(reportPerDoctor(ctx)).toEqual([
            { doctorId: 2, doctorName: 'Dr. Second', pendingBookedSlots: 0, nextFreeSlotId: null },
            { doctorId: 1, doctorName: 'Dr. First', pendingBookedSlots: 1, nextFreeSlotId: 101 }
        ]);
    });

    it('snapshots routine and triage waiting lists', () => {
        const ctx = createClinicContext();
        addDoctor(ctx, { id: 1, name: 'Dr. First', specialization: 'General' });
        addSlot(ctx, 1, { slotId: 101, startTime: '09:00', endTime: '09:15' });
        registerPatient(ctx, { id: 1, name: 'Someone', age: 50 });
        const routine = handleBooking(ctx, 1, 1);
        const later = handleEmergency(ctx, 2, 4);
        const sooner = handleEmergency(ctx, 3, 1);

        const snapshot = queueSnapshot(ctx);
        expect(snapshot.routine.map(t => t.id)).toEqual([routine.id]);
        expect(snapshot.triage.map(e => e.token.id)).toEqual([sooner.id, later.id]);
        expect(reportServedVsPending(ctx)).toEqual({ served: 0, pending: 3 });
    });
});
