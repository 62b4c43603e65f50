import { Decimal, formatCurrency, formatPercent } from '../utils/decimal.js';
import { formatLocalDateTime } from '../utils/date.utils.js';
import { toCsv } from '../utils/csv.js';
import type { Allocation, AllocationRun, PortfolioSummary } from '../models/portfolio.js';
import type { FailureReport } from '../errors.js';

export const OUTPUT_CSV_HEADERS = [
    'company_name',
    'symbol',
    'current_price',
    'target_allocation_pct',
    'target_amount',
    'shares_to_buy',
    'actual_allocation_amount',
    'actual_allocation_pct',
    'unallocated_amount',
    'timestamp'
] as const;

function money(value: number): string {
    return new Decimal(value).toFixed(2);
}

// Fraction -> percentage with 4 decimal places
function percent(fraction: number): string {
    return new Decimal(fraction).times(100).toFixed(4);
}

/**
 * Report Service
 * Presentation of allocation runs: CSV rows, the text summary and the
 * console overview. All rounding of amounts happens here.
 */
export class ReportService {

    allocationRow(allocation: Allocation, timestamp: Date): string[] {
        const { security } = allocation;
        return [
            security.companyName,
            security.symbol,
            security.currentPrice !== undefined && security.resolved ? money(security.currentPrice) : 'N/A',
            percent(allocation.targetPct),
            money(allocation.targetAmount),
            String(allocation.sharesToBuy),
            money(allocation.actualAmount),
            percent(allocation.actualPct),
            money(allocation.unallocatedAmount),
            formatLocalDateTime(timestamp)
        ];
    }

    /**
     * Allocation CSV for a run; the timestamp is assigned by the caller
     */
    buildAllocationCsv(run: AllocationRun, timestamp: Date): string {
        return toCsv(
            OUTPUT_CSV_HEADERS,
            run.allocations.map(a => this.allocationRow(a, timestamp))
        );
    }

    buildSummaryText(
        summary: PortfolioSummary,
        generatedAt: Date,
        failures: readonly FailureReport[] = []
    ): string {
        const lines = [
            'INDEX TRACKER - PORTFOLIO SUMMARY',
            '='.repeat(50),
            '',
            `Generated on: ${formatLocalDateTime(generatedAt)}`,
            '',
            `Total Investment Amount: ${formatCurrency(summary.totalInvestment)}`,
            `Total Allocated Amount:  ${formatCurrency(summary.totalAllocated)}`,
            `Total Unallocated:       ${formatCurrency(summary.totalUnallocated)}`,
            `Utilization Rate:        ${formatPercent(summary.utilizationRate)}`,
            '',
            `Total Shares to Buy:     ${summary.totalShares.toLocaleString('en-IN')}`,
            `Included Securities:     ${summary.includedSecurities}`,
            `Successful Securities:   ${summary.resolvedSecurities}`,
            `Failed Securities:       ${summary.failedSecurities}`,
            `Success Rate:            ${formatPercent(summary.successRate, 1)}`
        ];

        if (failures.length > 0) {
            lines.push('', 'Price lookup failures:');
            for (const failure of failures) {
                lines.push(`  ${failure.symbol}: ${failure.reason} after ${failure.attemptCount} attempts (${failure.message})`);
            }
        }

        return lines.join('\n') + '\n';
    }

    /**
     * Short console overview: summary figures and the first few allocations
     */
    buildConsoleOverview(run: AllocationRun, sampleSize: number = 5): string {
        const { summary } = run;
        const lines = [
            `Total investment:  ${formatCurrency(summary.totalInvestment)}`,
            `Total allocated:   ${formatCurrency(summary.totalAllocated)} (${formatPercent(summary.utilizationRate)})`,
            `Total unallocated: ${formatCurrency(summary.totalUnallocated)}`,
            `Total shares:      ${summary.totalShares}`,
            `Priced:            ${summary.resolvedSecurities}/${summary.includedSecurities} (${formatPercent(summary.successRate, 1)})`
        ];

        const sample = run.allocations.filter(a => a.security.resolved).slice(0, sampleSize);
        if (sample.length > 0) {
            lines.push('', `Sample allocations (first ${sample.length}):`);
            sample.forEach((a, i) => {
                lines.push(
                    `  ${i + 1}. ${a.security.symbol.padEnd(12)} - ${String(a.sharesToBuy).padStart(4)} shares @ ` +
                    `${formatCurrency(a.security.currentPrice ?? 0)} = ${formatCurrency(a.actualAmount)}`
                );
            });
        }

        return lines.join('\n');
    }
}

export const reportService = new ReportService();
