import express from 'express';
import cors from 'cors';
import { createAllocationsRouter, createSecuritiesRouter } from './routes/index.js';
import { logger } from './utils/logger.js';
import type { IndexTrackerService } from './services/index-tracker.service.js';

/**
 * Build the express app around a tracker instance
 */
export function createApp(tracker: IndexTrackerService): express.Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // Request logging
    app.use((req, res, next) => {
        logger.debug(`${req.method} ${req.path}`);
        next();
    });

    // API routes
    app.use('/api/securities', createSecuritiesRouter(tracker));
    app.use('/api/allocations', createAllocationsRouter(tracker));

    // Health check
    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // Error handling middleware (malformed JSON bodies end up here)
    app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        logger.error('Unhandled error:', err);
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}
