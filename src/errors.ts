/**
 * Fatal errors that abort an allocation run.
 * Per-security price failures are not errors at this level; they are
 * collected as FailureReport data by the price resolver.
 */

export type TrackerErrorCode = 'INVALID_INPUT' | 'EMPTY_UNIVERSE' | 'TOTAL_RESOLUTION_OUTAGE';

export abstract class TrackerError extends Error {
    abstract readonly code: TrackerErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Bad budget, malformed security record or invalid configuration
 */
export class InvalidInputError extends TrackerError {
    readonly code = 'INVALID_INPUT';
}

/**
 * Exclusions removed every security from the working set
 */
export class EmptyUniverseError extends TrackerError {
    readonly code = 'EMPTY_UNIVERSE';

    constructor(readonly excludedCount: number) {
        super(`No securities left to allocate after excluding ${excludedCount} securities`);
    }
}

/**
 * Not a single security could be priced, so any allocation would be meaningless
 */
export class TotalResolutionOutageError extends TrackerError {
    readonly code = 'TOTAL_RESOLUTION_OUTAGE';

    constructor(readonly failures: readonly FailureReport[]) {
        super(`Price resolution failed for all ${failures.length} securities`);
    }
}

export type PriceFailureReason =
    | 'timeout'
    | 'not_found'
    | 'malformed'
    | 'non_positive'
    | 'network'
    | 'http';

/**
 * Raised by a price source for a single lookup. Never escapes the resolver.
 */
export class PriceLookupError extends Error {
    constructor(readonly reason: PriceFailureReason, message: string) {
        super(message);
        this.name = 'PriceLookupError';
    }
}

/**
 * Final outcome for a security whose price could not be resolved
 */
export interface FailureReport {
    symbol: string;
    reason: PriceFailureReason;
    message: string;
    attemptCount: number;
}

export function isTrackerError(error: unknown): error is TrackerError {
    return error instanceof TrackerError;
}
