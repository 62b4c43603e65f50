import type { Security } from './security.js';

/**
 * Allocation - computed buy order for a single included security.
 * Amounts are unrounded; rounding happens when the result is presented.
 */
export interface Allocation {
    security: Security;
    targetPct: number; // fraction of the budget, 1/N
    targetAmount: number;
    sharesToBuy: number;
    actualAmount: number;
    actualPct: number; // fraction of the budget
    unallocatedAmount: number;
}

/**
 * Aggregate statistics over all allocations of a run.
 * totalAllocated + totalUnallocated equals totalInvestment.
 */
export interface PortfolioSummary {
    totalInvestment: number;
    totalAllocated: number;
    totalUnallocated: number;
    utilizationRate: number; // fraction
    totalShares: number;
    includedSecurities: number;
    resolvedSecurities: number;
    failedSecurities: number;
    successRate: number; // fraction
}

export interface AllocationRun {
    allocations: Allocation[];
    summary: PortfolioSummary;
    excluded: Security[];
}
