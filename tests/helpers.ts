import { createSecurity, type Security } from '../src/models/security';
import type { TrackerSettings } from '../src/config/settings';

export function makeSecurity(symbol: string, price?: number, isin?: string): Security {
    return createSecurity({
        symbol,
        companyName: `${symbol} Limited`,
        isin,
        currentPrice: price
    });
}

export function makeUniverse(count: number, price: number = 100): Security[] {
    return Array.from({ length: count }, (_, i) => {
        const n = String(i + 1).padStart(3, '0');
        return makeSecurity(`SYM${n}`, price, `INE${n}A01010`);
    });
}

export const testSettings: TrackerSettings = {
    port: 0,
    logLevel: 'ERROR',
    minInvestmentAmount: 1_000,
    maxInvestmentAmount: 100_000_000,
    priceFetch: {
        timeoutMs: 1_000,
        maxRetries: 2,
        backoffBaseMs: 100,
        backoffCapMs: 1_000,
        concurrency: 3,
        sourceUrl: 'https://prices.example.test/chart',
        exchangeSuffix: '.NS'
    },
    securitiesFile: 'does-not-exist.csv',
    outputDir: 'unused-output'
};

export const noSleep = (): Promise<void> => Promise.resolve();
