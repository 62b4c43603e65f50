import { Router, Request, Response } from 'express';
import { sendError } from './errors.js';
import type { IndexTrackerService } from '../services/index-tracker.service.js';

export function createSecuritiesRouter(tracker: IndexTrackerService): Router {
    const router = Router();

    // GET the configured index universe
    router.get('/', async (req: Request, res: Response) => {
        try {
            const securities = await tracker.loadUniverse({});
            res.json(securities);
        } catch (error) {
            sendError(res, error, 'Failed to load securities');
        }
    });

    return router;
}
