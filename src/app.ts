// src/app.ts

import express from 'express';
import { SchedulingError } from './errors';
import type { ScheduleExtractor } from './extraction/availabilityExtractor';
import { createScheduleRoutes } from './routes/scheduleRoutes';
import type { Logger } from './utils/logger';

/**
 * Express application setup
 *
 * Stateless: nothing is kept between requests. The extractor is injected
 * so the LLM backend can be swapped (and faked in tests).
 */
export function createApp(extractor: ScheduleExtractor, logger: Logger): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/schedule', createScheduleRoutes(extractor, logger));

    app.get('/', (_req, res) => {
        res.type('text/plain').send('Scheduling API is running.');
    });

    // Health check
    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy' });
    });

    // Error handling
    app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof SyntaxError) {
            logger.warn(`Rejected request: ${err.message}`);
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }

        const status = err instanceof SchedulingError ? err.statusCode : 500;
        const message = err instanceof Error ? err.message : String(err);

        if (status >= 500) {
            logger.error(`Error: ${message}`, err);
        } else {
            logger.warn(`Rejected request: ${message}`);
        }

        res.status(status).json({ error: message });
    });

    return app;
}
