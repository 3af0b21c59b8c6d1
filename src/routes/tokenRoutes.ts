// src/routes/tokenRoutes.ts

import { Router, Request, Response } from 'express';
import { ClinicContext } from '../engine/clinicContext';
import { handleBooking } from '../events/bookingHandler';
import { handleCancellation } from '../events/cancellationHandler';
import { handleEmergency } from '../events/emergencyHandler';
import { handleServeNext } from '../events/serviceHandler';
import { handleUndo } from '../events/undoHandler';
import { queueSnapshot } from '../reports/clinicReports';
import { NotFoundError } from '../lib/errors';
import { bookSchema, idParamSchema, parseInput, triageSchema } from './schemas';

/**
 * Token routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createTokenRoutes(ctx: ClinicContext): Router {
    const router = Router();

    /**
     * Book a routine visit
     * POST /tokens/book
     * Body: { patientId, doctorId }
     */
    router.post('/book', (req: Request, res: Response) => {
        const { patientId, doctorId } = parseInput(bookSchema, req.body);
        const token = handleBooking(ctx, patientId, doctorId);
        res.status(201).json({ token });
    });

    /**
     * Cancel a queued routine token
     * POST /tokens/cancel/:id
     */
    router.post('/cancel/:id', (req: Request, res: Response) => {
        const { id } = parseInput(idParamSchema, req.params);
        if (!handleCancellation(ctx, id)) {
            throw new NotFoundError(`Queued token ${id}`);
        }
        res.json({ cancelled: true, tokenId: id });
    });

    /**
     * Insert an emergency into triage
     * POST /tokens/triage
     * Body: { patientId, severity, doctorId? }
     */
    router.post('/triage', (req: Request, res: Response) => {
        const { patientId, severity, doctorId } = parseInput(triageSchema, req.body);
        const token = handleEmergency(ctx, patientId, severity, doctorId);
        res.status(201).json({ token });
    });

    router.post('/serve', (_req: Request, res: Response) => {
        res.json({ token: handleServeNext(ctx) });
    });

    router.post('/undo', (_req: Request, res: Response) => {
        res.json({ result: handleUndo(ctx) });
    });

    router.get('/queue', (_req: Request, res: Response) => {
        res.json(queueSnapshot(ctx));
    });

    return router;
}
