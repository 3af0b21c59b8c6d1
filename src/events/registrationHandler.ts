// src/events/registrationHandler.ts

import { Doctor } from '../models/Doctor';
import { Patient } from '../models/Patient';
import { Slot } from '../models/Slot';
import { ClinicContext, ledgerFor } from '../engine/clinicContext';
import { SlotLedger } from '../engine/slotLedger';
import { ConflictError, NotFoundError } from '../lib/errors';

export interface RegisterPatientInput {
    id: number;
    name: string;
    age: number;
    severity?: number;
    history?: string[];
}

export interface AddDoctorInput {
    id: number;
    name: string;
    specialization: string;
}

export interface AddSlotInput {
    slotId: number;
    startTime: string;
    endTime: string;
}

/**
 * Register a patient, replacing any existing record with the same id.
 * Registration is not an undoable action.
 */
export function registerPatient(ctx: ClinicContext, input: RegisterPatientInput): Patient {
    const patient: Patient = {
        id: input.id,
        name: input.name,
        age: input.age,
        severity: input.severity ?? 0,
        history: [...(input.history ?? [])]
    };
    const existed = ctx.patients.has(patient.id);
    ctx.patients.upsert(patient);

    ctx.logger.info({ patientId: patient.id, updated: existed }, 'patient registered');
    return patient;
}

export function getPatient(ctx: ClinicContext, patientId: number): Patient | null {
    return ctx.patients.get(patientId);
}

/**
 * Explicit removal only; tokens already issued keep their patient id.
 */
export function removePatient(ctx: ClinicContext, patientId: number): boolean {
    const deleted = ctx.patients.delete(patientId);
    if (deleted) {
        ctx.logger.info({ patientId }, 'patient removed');
    }
    return deleted;
}

/**
 * Add a doctor with an empty slot ledger
 *
 * Doctors are immutable once created, so a duplicate id is rejected.
 */
export function addDoctor(ctx: ClinicContext, input: AddDoctorInput): Doctor {
    if (ctx.doctors.has(input.id)) {
        throw new ConflictError(`Doctor ${input.id} already exists`);
    }

    const doctor: Doctor = {
        id: input.id,
        name: input.name,
        specialization: input.specialization
    };
    ctx.doctors.upsert(doctor);
    ctx.ledgers.set(doctor.id, new SlotLedger(doctor.id));

    ctx.logger.info({ doctorId: doctor.id, specialization: doctor.specialization }, 'doctor added');
    return doctor;
}

export function addSlot(ctx: ClinicContext, doctorId: number, input: AddSlotInput): Slot {
    const ledger = ledgerFor(ctx, doctorId);
    if (!ledger) {
        throw new NotFoundError(`Doctor ${doctorId}`);
    }

    const slot = ledger.addSlot(input.slotId, input.startTime, input.endTime);
    ctx.logger.info({ doctorId, slotId: slot.id }, 'slot added');
    return { ...slot };
}
