import { z } from 'zod';
import { PriceLookupError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import type { PriceSource } from './price-source.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface YahooFinanceOptions {
    baseUrl: string;
    exchangeSuffix: string;
    fetchFn?: FetchFn;
}

const ChartResponseSchema = z.object({
    chart: z.object({
        result: z
            .array(
                z.object({
                    meta: z.object({
                        regularMarketPrice: z.number().nullable().optional(),
                        currency: z.string().nullable().optional()
                    }),
                    indicators: z
                        .object({
                            quote: z.array(
                                z.object({
                                    close: z.array(z.number().nullable()).nullable().optional()
                                })
                            )
                        })
                        .optional()
                })
            )
            .nullable(),
        error: z
            .object({
                code: z.string(),
                description: z.string().nullable().optional()
            })
            .nullable()
            .optional()
    })
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>['chart']['result']>[number];

/**
 * Yahoo Finance price source
 * Reads the last traded price for an exchange-listed symbol from the chart
 * endpoint, falling back to the last available daily close of the past month.
 */
export class YahooFinancePriceSource implements PriceSource {
    readonly name = 'Yahoo Finance';
    private readonly fetchFn: FetchFn;

    constructor(private readonly options: YahooFinanceOptions) {
        this.fetchFn = options.fetchFn ?? fetch;
    }

    /**
     * Exchange ticker for a symbol, e.g. RELIANCE -> RELIANCE.NS
     */
    toExchangeSymbol(symbol: string): string {
        const suffix = this.options.exchangeSuffix;
        const trimmed = symbol.trim().toUpperCase();
        return suffix && !trimmed.endsWith(suffix.toUpperCase()) ? `${trimmed}${suffix}` : trimmed;
    }

    buildUrl(symbol: string): string {
        const ticker = encodeURIComponent(this.toExchangeSymbol(symbol));
        return `${this.options.baseUrl.replace(/\/+$/, '')}/${ticker}?range=1mo&interval=1d`;
    }

    async lookupPrice(symbol: string, signal: AbortSignal): Promise<number> {
        const url = this.buildUrl(symbol);
        logger.debug(`Fetching ${url}`);

        let response: Response;
        try {
            response = await this.fetchFn(url, { signal, headers: { Accept: 'application/json' } });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new PriceLookupError('network', `Request failed: ${message}`);
        }

        if (response.status === 404) {
            throw new PriceLookupError('not_found', `No market data for ${this.toExchangeSymbol(symbol)}`);
        }
        if (!response.ok) {
            throw new PriceLookupError('http', `Price API error: ${response.status}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new PriceLookupError('malformed', 'Response is not valid JSON');
        }

        const parsed = ChartResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new PriceLookupError('malformed', `Unexpected response shape: ${parsed.error.issues[0]?.message}`);
        }

        const { result, error } = parsed.data.chart;
        if (!result || result.length === 0) {
            if (error) {
                throw new PriceLookupError('not_found', error.description ?? error.code);
            }
            throw new PriceLookupError('not_found', `No market data for ${this.toExchangeSymbol(symbol)}`);
        }

        const price = this.extractPrice(result[0]);
        if (price === undefined) {
            throw new PriceLookupError('malformed', 'Response carries no price');
        }
        if (price <= 0) {
            throw new PriceLookupError('non_positive', `Invalid price for ${symbol}: ${price}`);
        }
        return price;
    }

    private extractPrice(result: ChartResult): number | undefined {
        const marketPrice = result.meta.regularMarketPrice;
        if (marketPrice !== null && marketPrice !== undefined) {
            return marketPrice;
        }

        // Last available close of the recent history
        const closes = result.indicators?.quote[0]?.close ?? [];
        for (let i = closes.length - 1; i >= 0; i--) {
            const close = closes[i];
            if (close !== null) {
                return close;
            }
        }
        return undefined;
    }
}
