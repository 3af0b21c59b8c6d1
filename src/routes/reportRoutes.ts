// src/routes/reportRoutes.ts

import { Router, Request, Response } from 'express';
import { ClinicContext } from '../engine/clinicContext';
import { reportPerDoctor, reportServedVsPending, topKFrequentPatients } from '../reports/clinicReports';
import { parseInput, topPatientsQuerySchema } from './schemas';

export function createReportRoutes(ctx: ClinicContext): Router {
    const router = Router();

    router.get('/doctors', (_req: Request, res: Response) => {
        res.json({ doctors: reportPerDoctor(ctx) });
    });

    router.get('/served-vs-pending', (_req: Request, res: Response) => {
        res.json(reportServedVsPending(ctx));
    });

    // GET /reports/top-patients?k=3
    router.get('/top-patients', (req: Request, res: Response) => {
        const { k } = parseInput(topPatientsQuerySchema, req.query);
        res.json({ patients: topKFrequentPatients(ctx, k) });
    });

    return router;
}
