// src/server.ts

import 'dotenv/config';
import { createApp } from './app';
import { createClinicContext } from './engine/clinicContext';
import { loadConfig } from './lib/config';
import { createLogger } from './lib/logger';

const config = loadConfig();
const logger = createLogger({ name: 'opd-triage-desk', level: config.logLevel });

const ctx = createClinicContext({
    queueCapacity: config.queueCapacity,
    tokenIdStart: config.tokenIdStart,
    logger
});

createApp(ctx).listen(config.port, () => {
    logger.info({ port: config.port, queueCapacity: config.queueCapacity }, 'OPD triage desk listening');
});
