import type { Response } from 'express';
import { isTrackerError, type TrackerErrorCode } from '../errors.js';
import { logger } from '../utils/logger.js';

const STATUS_BY_CODE: Record<TrackerErrorCode, number> = {
    INVALID_INPUT: 400,
    EMPTY_UNIVERSE: 422,
    TOTAL_RESOLUTION_OUTAGE: 502
};

/**
 * Send a JSON error response. Tracker errors map to client/upstream statuses;
 * anything else is logged and reported as a 500 with the fallback message.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
    if (isTrackerError(error)) {
        res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code });
        return;
    }
    logger.error(`${fallbackMessage}:`, error);
    res.status(500).json({ error: fallbackMessage });
}
