/**
 * Price source capability used by the price resolver.
 * Implementations throw PriceLookupError when a price cannot be produced and
 * should stop work when the signal is aborted: a timed-out lookup holds its
 * concurrency slot until its promise settles.
 */
export interface PriceSource {
    readonly name: string;
    lookupPrice(symbol: string, signal: AbortSignal): Promise<number>;
}
