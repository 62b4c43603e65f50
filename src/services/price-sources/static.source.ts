import { PriceLookupError } from '../../errors.js';
import { normalizeSymbol } from '../../models/security.js';
import type { PriceSource } from './price-source.js';

/**
 * Price source backed by a fixed symbol -> price table,
 * e.g. a prices file for offline runs.
 */
export class StaticPriceSource implements PriceSource {
    readonly name: string;
    private readonly prices = new Map<string, number>();

    constructor(prices: Record<string, number>, name: string = 'static prices') {
        this.name = name;
        for (const [symbol, price] of Object.entries(prices)) {
            this.prices.set(normalizeSymbol(symbol), price);
        }
    }

    get size(): number {
        return this.prices.size;
    }

    async lookupPrice(symbol: string, signal: AbortSignal): Promise<number> {
        if (signal.aborted) {
            throw new PriceLookupError('timeout', 'Lookup aborted');
        }
        const price = this.prices.get(normalizeSymbol(symbol));
        if (price === undefined) {
            throw new PriceLookupError('not_found', `No price listed for ${symbol}`);
        }
        return price;
    }
}
