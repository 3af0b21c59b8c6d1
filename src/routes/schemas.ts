// src/routes/schemas.ts

import { z } from 'zod';
import { ValidationError } from '../lib/errors';

const id = z.number().int().nonnegative();
const timeLabel = z.string().trim().min(1);

export const registerPatientSchema = z.object({
    id,
    name: z.string().trim().min(1),
    age: z.number().int().min(0).max(150),
    severity: z.number().int().optional(),
    history: z.array(z.string()).optional()
});

export const addDoctorSchema = z.object({
    id,
    name: z.string().trim().min(1),
    specialization: z.string().trim().min(1)
});

export const addSlotSchema = z.object({
    slotId: id,
    startTime: timeLabel,
    endTime: timeLabel
});

export const bookSchema = z.object({
    patientId: id,
    doctorId: id
});

export const triageSchema = z.object({
    patientId: id,
    severity: z.number().int(),
    doctorId: id.optional()
});

export const idParamSchema = z.object({
    id: z.coerce.number().int().nonnegative()
});

export const topPatientsQuerySchema = z.object({
    k: z.coerce.number().int().min(0).default(3)
});

/**
 * Parse request input, turning zod failures into a 400
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid request', parsed.error.flatten());
    }
    return parsed.data;
}
