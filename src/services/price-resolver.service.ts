import {
    InvalidInputError,
    PriceLookupError,
    TotalResolutionOutageError,
    type FailureReport
} from '../errors.js';
import { withResolvedPrice, type Security } from '../models/security.js';
import { mapWithConcurrency, sleep } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type { PriceSource } from './price-sources/price-source.js';

/**
 * Retry and throughput policy for price lookups
 */
export interface RetryPolicy {
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffCapMs: number;
    concurrency: number;
}

export interface PriceResolution {
    // Same order as the input
    securities: Security[];
    failures: FailureReport[];
    resolvedCount: number;
    fromInputCount: number;
}

interface ItemOutcome {
    security: Security;
    failure?: FailureReport;
}

/**
 * Price Resolver Service
 * Resolves a current price for every security through a PriceSource,
 * retrying failed lookups with exponential backoff.
 */
export class PriceResolverService {
    private readonly policy: RetryPolicy;

    constructor(
        private readonly source: PriceSource,
        policy: RetryPolicy,
        private readonly sleepFn: (ms: number) => Promise<void> = sleep
    ) {
        if (!(policy.timeoutMs > 0)) {
            throw new InvalidInputError(`timeoutMs must be positive, got ${policy.timeoutMs}`);
        }
        if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
            throw new InvalidInputError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
        }
        if (!Number.isInteger(policy.concurrency) || policy.concurrency < 1) {
            throw new InvalidInputError(`concurrency must be at least 1, got ${policy.concurrency}`);
        }
        if (policy.backoffBaseMs < 0 || policy.backoffCapMs < 0) {
            throw new InvalidInputError('Backoff delays cannot be negative');
        }
        this.policy = { ...policy };
    }

    /**
     * Delay before the retry that follows a failed attempt (0-based):
     * min(backoffBase * 2^attempt, backoffCap)
     */
    backoffDelay(attempt: number): number {
        return Math.min(this.policy.backoffBaseMs * 2 ** attempt, this.policy.backoffCapMs);
    }

    /**
     * Resolve prices for a batch of securities.
     * Securities already priced from input data are kept as they are.
     * Individual failures are returned as FailureReports; only a batch in
     * which nothing could be priced throws (TotalResolutionOutageError).
     */
    async resolve(securities: readonly Security[]): Promise<PriceResolution> {
        const fromInputCount = securities.filter(s => s.resolved).length;
        logger.info(
            `Starting batch price fetch for ${securities.length} securities from ${this.source.name} ` +
            `(${fromInputCount} already priced from input)`
        );

        let completed = 0;
        const outcomes = await mapWithConcurrency(securities, this.policy.concurrency, async security => {
            const outcome = await this.resolveOne(security);
            completed++;
            if (outcome.failure) {
                logger.error(`✗ ${security.symbol}: ${outcome.failure.message} (${completed}/${securities.length})`);
            } else {
                logger.debug(`✓ ${security.symbol}: ${outcome.security.currentPrice} (${completed}/${securities.length})`);
            }
            return outcome;
        });

        const failures = outcomes.flatMap(o => (o.failure ? [o.failure] : []));
        const resolvedCount = outcomes.length - failures.length;

        const rate = securities.length > 0 ? (resolvedCount / securities.length) * 100 : 0;
        logger.info(`Batch fetch completed: ${resolvedCount}/${securities.length} successful (${rate.toFixed(1)}%)`);
        if (failures.length > 0) {
            logger.warn(`Failed securities: ${failures.map(f => f.symbol).join(', ')}`);
        }

        if (securities.length > 0 && resolvedCount === 0) {
            throw new TotalResolutionOutageError(failures);
        }

        return {
            securities: outcomes.map(o => o.security),
            failures,
            resolvedCount,
            fromInputCount
        };
    }

    private async resolveOne(security: Security): Promise<ItemOutcome> {
        if (security.resolved) {
            return { security };
        }

        const attempts = this.policy.maxRetries + 1;
        let lastError = new PriceLookupError('network', 'No lookup attempted');

        for (let attempt = 0; attempt < attempts; attempt++) {
            try {
                const price = await this.lookupWithTimeout(security.symbol);
                return { security: withResolvedPrice(security, price, 'live') };
            } catch (error) {
                lastError = toLookupError(error);
                logger.warn(
                    `Error fetching price for ${security.symbol} (attempt ${attempt + 1}/${attempts}): ` +
                    `[${lastError.reason}] ${lastError.message}`
                );

                if (attempt < attempts - 1) {
                    await this.sleepFn(this.backoffDelay(attempt));
                }
            }
        }

        return {
            security,
            failure: {
                symbol: security.symbol,
                reason: lastError.reason,
                message: lastError.message,
                attemptCount: attempts
            }
        };
    }

    private async lookupWithTimeout(symbol: string): Promise<number> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        let timedOut = false;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                timedOut = true;
                controller.abort();
                reject(new PriceLookupError('timeout', `Timed out after ${this.policy.timeoutMs}ms`));
            }, this.policy.timeoutMs);
        });
        const lookup = Promise.resolve().then(() => this.source.lookupPrice(symbol, controller.signal));

        try {
            const price = await Promise.race([lookup, timeout]);

            if (typeof price !== 'number' || !Number.isFinite(price)) {
                throw new PriceLookupError('malformed', `Price source returned ${String(price)}`);
            }
            if (price <= 0) {
                throw new PriceLookupError('non_positive', `Invalid price ${price}`);
            }
            return price;
        } finally {
            clearTimeout(timer);
            // An abandoned lookup keeps its concurrency slot until it settles
            if (timedOut) {
                await lookup.then(
                    () => undefined,
                    () => undefined
                );
            }
        }
    }
}

function toLookupError(error: unknown): PriceLookupError {
    if (error instanceof PriceLookupError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new PriceLookupError('network', message);
}
