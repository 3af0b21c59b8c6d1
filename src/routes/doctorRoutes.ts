// src/routes/doctorRoutes.ts

import { Router, Request, Response } from 'express';
import { ClinicContext, ledgerFor } from '../engine/clinicContext';
import { addDoctor, addSlot } from '../events/registrationHandler';
import { NotFoundError } from '../lib/errors';
import { addDoctorSchema, addSlotSchema, idParamSchema, parseInput } from './schemas';

/**
 * Doctor routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createDoctorRoutes(ctx: ClinicContext): Router {
    const router = Router();

    /**
     * Add a new doctor
     * POST /doctors
     * Body: { id, name, specialization }
     */
    router.post('/', (req: Request, res: Response) => {
        const input = parseInput(addDoctorSchema, req.body);
        const doctor = addDoctor(ctx, input);
        res.status(201).json({ doctor });
    });

    /**
     * Add a bookable slot
     * POST /doctors/:id/slots
     * Body: { slotId, startTime, endTime }
     */
    router.post('/:id/slots', (req: Request, res: Response) => {
        const { id } = parseInput(idParamSchema, req.params);
        const input = parseInput(addSlotSchema, req.body);
        const slot = addSlot(ctx, id, input);
        res.status(201).json({ slot });
    });

    /**
     * Get doctor's slots, in booking scan order
     * GET /doctors/:id/slots
     */
    router.get('/:id/slots', (req: Request, res: Response) => {
        const { id } = parseInput(idParamSchema, req.params);
        const ledger = ledgerFor(ctx, id);
        if (!ledger) {
            throw new NotFoundError(`Doctor ${id}`);
        }
        res.json({ slots: ledger.listSlots() });
    });

    return router;
}
