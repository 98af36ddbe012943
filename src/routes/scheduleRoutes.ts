// src/routes/scheduleRoutes.ts

import { Router, Request, Response, NextFunction } from 'express';
import type { ScheduleExtractor } from '../extraction/availabilityExtractor';
import { handleScheduleRequest, parseScheduleRequest } from '../events/scheduleRequestHandler';
import type { Logger } from '../utils/logger';

/**
 * Schedule routes - HTTP mapping only
 * Business logic delegated to events/engine
 */
export function createScheduleRoutes(extractor: ScheduleExtractor, logger: Logger): Router {
    const router = Router();

    /**
     * Rank the times every participant can make
     * POST /schedule
     * Body: { messages: string[] }
     */
    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const messages = parseScheduleRequest(req.body);
            const recommended = await handleScheduleRequest(messages, extractor, logger);

            res.json({ recommended_times: recommended });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
