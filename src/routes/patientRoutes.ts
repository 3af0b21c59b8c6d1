// src/routes/patientRoutes.ts

import { Router, Request, Response } from 'express';
import { ClinicContext } from '../engine/clinicContext';
import { getPatient, registerPatient, removePatient } from '../events/registrationHandler';
import { NotFoundError } from '../lib/errors';
import { idParamSchema, parseInput, registerPatientSchema } from './schemas';

/**
 * Patient routes - HTTP mapping only
 */
export function createPatientRoutes(ctx: ClinicContext): Router {
    const router = Router();

    /**
     * Register or update a patient
     * POST /patients
     * Body: { id, name, age, severity?, history? }
     */
    router.post('/', (req: Request, res: Response) => {
        const input = parseInput(registerPatientSchema, req.body);
        const patient = registerPatient(ctx, input);
        res.status(201).json({ patient });
    });

    router.get('/:id', (req: Request, res: Response) => {
        const { id } = parseInput(idParamSchema, req.params);
        const patient = getPatient(ctx, id);
        if (!patient) {
            throw new NotFoundError(`Patient ${id}`);
        }
        res.json({ patient });
    });

    router.delete('/:id', (req: Request, res: Response) => {
        const { id } = parseInput(idParamSchema, req.params);
        res.json({ deleted: removePatient(ctx, id) });
    });

    return router;
}
