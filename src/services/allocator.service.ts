import { Decimal, toDecimal, safeDivide, wholeUnits, roundToCurrency, roundToPercent } from '../utils/decimal.js';
import { EmptyUniverseError, InvalidInputError } from '../errors.js';
import { describeSecurity, isPriceAvailable, normalizeSymbol } from '../models/security.js';
import { buildExclusionIndex, matchesExclusion } from '../models/exclusion.js';
import { logger } from '../utils/logger.js';
import type { Security } from '../models/security.js';
import type { ExclusionEntry } from '../models/exclusion.js';
import type { Allocation, AllocationRun, PortfolioSummary } from '../models/portfolio.js';

export interface ExclusionResult {
    included: Security[];
    excluded: Security[];
}

/**
 * Allocator Service
 * Equal-weight allocation of a budget across the included securities,
 * rounded down to whole shares.
 */
export class AllocatorService {

    /**
     * Split securities into included and excluded.
     * A security is excluded when its symbol (case-insensitive) or its ISIN
     * matches an exclusion entry.
     */
    applyExclusions(securities: readonly Security[], exclusions: readonly ExclusionEntry[]): ExclusionResult {
        if (exclusions.length === 0) {
            return { included: [...securities], excluded: [] };
        }

        const index = buildExclusionIndex(exclusions);
        const included: Security[] = [];
        const excluded: Security[] = [];

        for (const security of securities) {
            if (matchesExclusion(security, index)) {
                logger.debug(`Excluding security: ${describeSecurity(security)}`);
                excluded.push(security);
            } else {
                included.push(security);
            }
        }

        logger.info(`Excluded ${excluded.length} of ${securities.length} securities, ${included.length} remaining`);
        return { included, excluded };
    }

    /**
     * Compute allocations and the portfolio summary.
     *
     * Every included security gets 1/N of the budget. Resolved securities buy
     * floor(target / price) shares; unresolved ones buy nothing and their whole
     * target is reported as unallocated.
     */
    allocate(
        budget: number,
        securities: readonly Security[],
        exclusions: readonly ExclusionEntry[] = []
    ): AllocationRun {
        if (!Number.isFinite(budget) || budget <= 0) {
            throw new InvalidInputError(`Investment amount must be positive, got ${budget}`);
        }
        if (securities.length === 0) {
            throw new InvalidInputError('No securities supplied');
        }
        this.assertUniqueSymbols(securities);

        const { included, excluded } = this.applyExclusions(securities, exclusions);
        if (included.length === 0) {
            throw new EmptyUniverseError(excluded.length);
        }

        const total = toDecimal(budget);
        const weight = safeDivide(1, included.length);
        const targetAmount = safeDivide(total, included.length);

        logger.info(
            `Target allocation per security: ${roundToCurrency(targetAmount)} ` +
            `(${roundToPercent(weight.times(100))}%) for ${included.length} securities`
        );

        let totalAllocated = new Decimal(0);
        let totalUnallocated = new Decimal(0);
        let totalShares = 0;
        let resolved = 0;

        const allocations = included.map(security => {
            const row = this.allocateSecurity(security, total, weight, targetAmount);

            totalAllocated = totalAllocated.plus(row.actual);
            totalUnallocated = totalUnallocated.plus(row.unallocated);
            totalShares += row.allocation.sharesToBuy;
            if (isPriceAvailable(security)) resolved++;

            return row.allocation;
        });

        const failed = included.length - resolved;
        const summary: PortfolioSummary = {
            totalInvestment: budget,
            totalAllocated: totalAllocated.toNumber(),
            totalUnallocated: totalUnallocated.toNumber(),
            utilizationRate: safeDivide(totalAllocated, total).toNumber(),
            totalShares,
            includedSecurities: included.length,
            resolvedSecurities: resolved,
            failedSecurities: failed,
            successRate: safeDivide(resolved, included.length).toNumber()
        };

        logger.info(
            `Allocation complete: ${summary.totalShares} shares, ` +
            `${roundToCurrency(summary.totalAllocated)} allocated, ` +
            `${roundToCurrency(summary.totalUnallocated)} unallocated`
        );
        if (failed > 0) {
            logger.warn(`${failed} securities have no price; their target amount is unallocated`);
        }

        return { allocations, summary, excluded };
    }

    private allocateSecurity(
        security: Security,
        total: Decimal,
        weight: Decimal,
        targetAmount: Decimal
    ): { allocation: Allocation; actual: Decimal; unallocated: Decimal } {
        const shares = isPriceAvailable(security)
            ? wholeUnits(targetAmount, toDecimal(security.currentPrice))
            : new Decimal(0);
        const actual = isPriceAvailable(security)
            ? shares.times(security.currentPrice)
            : new Decimal(0);
        const unallocated = targetAmount.minus(actual);

        return {
            allocation: {
                security,
                targetPct: weight.toNumber(),
                targetAmount: targetAmount.toNumber(),
                sharesToBuy: shares.toNumber(),
                actualAmount: actual.toNumber(),
                actualPct: safeDivide(actual, total).toNumber(),
                unallocatedAmount: unallocated.toNumber()
            },
            actual,
            unallocated
        };
    }

    /**
     * Reject a security list that repeats a symbol (case-insensitive)
     */
    assertUniqueSymbols(securities: readonly Security[]): void {
        const seen = new Set<string>();
        for (const security of securities) {
            const symbol = normalizeSymbol(security.symbol);
            if (seen.has(symbol)) {
                throw new InvalidInputError(`Duplicate symbol in securities list: ${security.symbol}`);
            }
            seen.add(symbol);
        }
    }
}

export const allocator = new AllocatorService();
