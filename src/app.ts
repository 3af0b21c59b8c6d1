// src/app.ts

import express from 'express';
import { ClinicContext } from './engine/clinicContext';
import { createPatientRoutes } from './routes/patientRoutes';
import { createDoctorRoutes } from './routes/doctorRoutes';
import { createTokenRoutes } from './routes/tokenRoutes';
import { createReportRoutes } from './routes/reportRoutes';
import { AppError, ValidationError } from './lib/errors';

/**
 * Express application setup
 *
 * All clinic state lives in the context passed in; the app holds none of its own.
 * Handlers are synchronous, so each request's mutation finishes before the next runs.
 */
export function createApp(ctx: ClinicContext): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/patients', createPatientRoutes(ctx));
    app.use('/doctors', createDoctorRoutes(ctx));
    app.use('/tokens', createTokenRoutes(ctx));
    app.use('/reports', createReportRoutes(ctx));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            patients: ctx.patients.size,
            doctors: ctx.doctors.size,
            routineQueued: ctx.routineQueue.size,
            triageWaiting: ctx.triage.size
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof AppError) {
            if (!err.isOperational) {
                ctx.logger.error({ err }, 'internal defect');
            }
            const body = err instanceof ValidationError
                ? { error: err.toSafeError(), details: err.details }
                : { error: err.toSafeError() };
            res.status(err.statusCode).json(body);
            return;
        }

        // Malformed JSON from express.json()
        if ('status' in err && err.status === 400) {
            res.status(400).json({ error: { code: 'BAD_REQUEST', message: 'Malformed request body', statusCode: 400 } });
            return;
        }

        ctx.logger.error({ err }, 'unhandled error');
        res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error', statusCode: 500 } });
    });

    return app;
}
