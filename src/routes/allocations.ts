import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import { createSecurity } from '../models/security.js';
import { createExclusionEntry } from '../models/exclusion.js';
import { reportService } from '../services/report.service.js';
import { formatFileTimestamp } from '../utils/date.utils.js';
import { sendError } from './errors.js';
import type { IndexTrackerService, TrackerRunInput, TrackerRunResult } from '../services/index-tracker.service.js';

const AllocationRequestSchema = z.object({
    // A JSON number or a numeric string such as "10000" or "2500.50"
    amount: z
        .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'amount must be a number')], {
            errorMap: () => ({ message: 'amount must be a number' })
        })
        .pipe(z.coerce.number()),
    securities: z.array(z.unknown()).optional(),
    exclusions: z.array(z.unknown()).optional()
});

function parseRequest(body: unknown): TrackerRunInput {
    const parsed = AllocationRequestSchema.safeParse(body);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
        throw new InvalidInputError(`Invalid request: ${issues}`);
    }

    return {
        amount: parsed.data.amount,
        securities: parsed.data.securities?.map(createSecurity),
        exclusions: parsed.data.exclusions?.map(createExclusionEntry)
    };
}

function toResponse(result: TrackerRunResult) {
    return {
        runId: result.runId,
        generatedAt: result.generatedAt.toISOString(),
        summary: result.run.summary,
        allocations: result.run.allocations,
        excluded: result.run.excluded.map(s => s.symbol),
        failures: result.failures
    };
}

export function createAllocationsRouter(tracker: IndexTrackerService): Router {
    const router = Router();

    // POST compute allocations
    router.post('/', async (req: Request, res: Response) => {
        try {
            const result = await tracker.run(parseRequest(req.body));
            res.json(toResponse(result));
        } catch (error) {
            sendError(res, error, 'Failed to compute allocations');
        }
    });

    // POST compute allocations as a CSV download
    router.post('/csv', async (req: Request, res: Response) => {
        try {
            const result = await tracker.run(parseRequest(req.body));
            const csv = reportService.buildAllocationCsv(result.run, result.generatedAt);

            res.setHeader('Content-Type', 'text/csv');
            res.setHeader(
                'Content-Disposition',
                `attachment; filename=index_allocation_${formatFileTimestamp(result.generatedAt)}.csv`
            );
            res.send(csv);
        } catch (error) {
            sendError(res, error, 'Failed to export allocations');
        }
    });

    return router;
}
