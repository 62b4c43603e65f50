import { PriceResolverService, type RetryPolicy } from '../src/services/price-resolver.service';
import { InvalidInputError, PriceLookupError, TotalResolutionOutageError } from '../src/errors';
import type { PriceSource } from '../src/services/price-sources/price-source';
import { makeSecurity } from './helpers';

type Step = number | Error | 'hang';

/**
 * Price source that plays back a scripted outcome per call for each symbol.
 * The last step repeats once the script runs out.
 */
class ScriptedPriceSource implements PriceSource {
    readonly name = 'scripted';
    readonly calls: string[] = [];
    readonly signals: AbortSignal[] = [];

    constructor(private readonly scripts: Record<string, Step[]>) {}

    async lookupPrice(symbol: string, signal: AbortSignal): Promise<number> {
        const attempt = this.calls.filter(s => s === symbol).length;
        this.calls.push(symbol);
        this.signals.push(signal);

        const script = this.scripts[symbol] ?? [new PriceLookupError('not_found', `Unknown ${symbol}`)];
        const step = script[Math.min(attempt, script.length - 1)];

        if (step === 'hang') {
            return new Promise<number>((_, reject) => {
                signal.addEventListener('abort', () => reject(new Error('aborted')));
            });
        }
        if (step instanceof Error) {
            throw step;
        }
        return step;
    }
}

const policy: RetryPolicy = {
    timeoutMs: 1000,
    maxRetries: 2,
    backoffBaseMs: 100,
    backoffCapMs: 1000,
    concurrency: 3
};

function recordingSleep() {
    const delays: number[] = [];
    const sleep = (ms: number): Promise<void> => {
        delays.push(ms);
        return Promise.resolve();
    };
    return { delays, sleep };
}

describe('PriceResolverService', () => {
    describe('resolve', () => {
        it('should price every security and keep input order', async () => {
            const source = new ScriptedPriceSource({ AAA: [101.5], BBB: [202.25], CCC: [303] });
            const resolver = new PriceResolverService(source, policy, recordingSleep().sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('BBB'), makeSecurity('CCC')]);

            expect(result.securities.map(s => s.symbol)).toEqual(['AAA', 'BBB', 'CCC']);
            expect(result.securities.map(s => s.currentPrice)).toEqual([101.5, 202.25, 303]);
            expect(result.securities.every(s => s.resolved && s.priceOrigin === 'live')).toBe(true);
            expect(result.failures).toEqual([]);
            expect(result.resolvedCount).toBe(3);
        });

        it('should not mutate the input securities', async () => {
            const source = new ScriptedPriceSource({ AAA: [50] });
            const resolver = new PriceResolverService(source, policy, recordingSleep().sleep);
            const input = makeSecurity('AAA');

            await resolver.resolve([input]);

            expect(input.resolved).toBe(false);
            expect(input.currentPrice).toBeUndefined();
        });

        it('should retry transient failures with exponential backoff', async () => {
            const source = new ScriptedPriceSource({
                AAA: [new PriceLookupError('network', 'reset'), new PriceLookupError('http', 'Price API error: 503'), 150],
                BBB: [75]
            });
            const { delays, sleep } = recordingSleep();
            const resolver = new PriceResolverService(source, policy, sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('BBB')]);

            expect(result.securities[0].currentPrice).toBe(150);
            expect(source.calls.filter(s => s === 'AAA')).toHaveLength(3);
            expect(delays).toEqual([100, 200]);
            expect(result.failures).toEqual([]);
        });

        it('should report a failure after exhausting retries', async () => {
            const source = new ScriptedPriceSource({
                AAA: [120],
                BAD: [new PriceLookupError('not_found', 'No market data for BAD.NS')]
            });
            const { delays, sleep } = recordingSleep();
            const resolver = new PriceResolverService(source, policy, sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('BAD')]);

            expect(result.failures).toEqual([
                { symbol: 'BAD', reason: 'not_found', message: 'No market data for BAD.NS', attemptCount: 3 }
            ]);
            expect(result.securities[1].resolved).toBe(false);
            expect(result.securities[1].currentPrice).toBeUndefined();
            expect(result.resolvedCount).toBe(1);
            expect(delays).toEqual([100, 200]);
        });

        it('should treat zero and negative prices as failures', async () => {
            const source = new ScriptedPriceSource({ AAA: [100], ZERO: [0], NEG: [-12.5] });
            const resolver = new PriceResolverService(source, { ...policy, maxRetries: 0 }, recordingSleep().sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('ZERO'), makeSecurity('NEG')]);

            expect(result.failures.map(f => [f.symbol, f.reason])).toEqual([
                ['ZERO', 'non_positive'],
                ['NEG', 'non_positive']
            ]);
        });

        it('should treat a NaN price as malformed', async () => {
            const source = new ScriptedPriceSource({ AAA: [100], ODD: [Number.NaN] });
            const resolver = new PriceResolverService(source, { ...policy, maxRetries: 0 }, recordingSleep().sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('ODD')]);

            expect(result.failures[0]).toMatchObject({ symbol: 'ODD', reason: 'malformed', attemptCount: 1 });
        });

        it('should abort and retry a lookup that exceeds the timeout', async () => {
            const source = new ScriptedPriceSource({ AAA: [100], SLOW: ['hang', 88] });
            const resolver = new PriceResolverService(
                source,
                { ...policy, timeoutMs: 5, maxRetries: 1 },
                recordingSleep().sleep
            );

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('SLOW')]);

            const slowSignal = source.signals[source.calls.indexOf('SLOW')];
            expect(slowSignal.aborted).toBe(true);
            expect(result.securities[1].currentPrice).toBe(88);
            expect(result.failures).toEqual([]);
        });

        it('should report a timeout once retries run out', async () => {
            const source = new ScriptedPriceSource({ AAA: [100], SLOW: ['hang'] });
            const resolver = new PriceResolverService(
                source,
                { ...policy, timeoutMs: 5, maxRetries: 0 },
                recordingSleep().sleep
            );

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('SLOW')]);

            expect(result.failures).toEqual([
                { symbol: 'SLOW', reason: 'timeout', message: 'Timed out after 5ms', attemptCount: 1 }
            ]);
        });

        it('should classify unexpected errors as network failures', async () => {
            const source = new ScriptedPriceSource({ AAA: [100], ERR: [new TypeError('fetch failed')] });
            const resolver = new PriceResolverService(source, { ...policy, maxRetries: 0 }, recordingSleep().sleep);

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('ERR')]);

            expect(result.failures[0]).toEqual({
                symbol: 'ERR',
                reason: 'network',
                message: 'fetch failed',
                attemptCount: 1
            });
        });

        it('should keep prices supplied with the input without a lookup', async () => {
            const source = new ScriptedPriceSource({ BBB: [20] });
            const resolver = new PriceResolverService(source, policy, recordingSleep().sleep);

            const result = await resolver.resolve([makeSecurity('AAA', 99.5), makeSecurity('BBB')]);

            expect(source.calls).toEqual(['BBB']);
            expect(result.fromInputCount).toBe(1);
            expect(result.securities[0]).toMatchObject({ currentPrice: 99.5, priceOrigin: 'input' });
            expect(result.resolvedCount).toBe(2);
        });

        it('should raise TotalResolutionOutageError when nothing can be priced', async () => {
            const source = new ScriptedPriceSource({
                AAA: [new PriceLookupError('network', 'getaddrinfo ENOTFOUND')],
                BBB: [new PriceLookupError('network', 'getaddrinfo ENOTFOUND')]
            });
            const resolver = new PriceResolverService(source, policy, recordingSleep().sleep);

            const outcome = resolver.resolve([makeSecurity('AAA'), makeSecurity('BBB')]);

            await expect(outcome).rejects.toBeInstanceOf(TotalResolutionOutageError);
            await expect(outcome).rejects.toMatchObject({
                code: 'TOTAL_RESOLUTION_OUTAGE',
                failures: [
                    { symbol: 'AAA', reason: 'network', attemptCount: 3 },
                    { symbol: 'BBB', reason: 'network', attemptCount: 3 }
                ]
            });
        });

        it('should return an empty resolution for an empty batch', async () => {
            const resolver = new PriceResolverService(new ScriptedPriceSource({}), policy, recordingSleep().sleep);

            const result = await resolver.resolve([]);

            expect(result).toEqual({ securities: [], failures: [], resolvedCount: 0, fromInputCount: 0 });
        });

        it('should keep at most `concurrency` lookups in flight', async () => {
            let active = 0;
            let maxActive = 0;
            const source: PriceSource = {
                name: 'counting',
                async lookupPrice() {
                    active++;
                    maxActive = Math.max(maxActive, active);
                    await new Promise(resolve => setImmediate(resolve));
                    active--;
                    return 10;
                }
            };
            const resolver = new PriceResolverService(source, policy, recordingSleep().sleep);
            const securities = Array.from({ length: 10 }, (_, i) => makeSecurity(`S${i}`));

            const result = await resolver.resolve(securities);

            expect(result.resolvedCount).toBe(10);
            expect(maxActive).toBe(3);
        });
    });

    describe('timed-out lookups', () => {
        it('should hold the concurrency slot until a lookup that ignores abort settles', async () => {
            let active = 0;
            let maxActive = 0;
            const attempts = new Map<string, number>();
            const source: PriceSource = {
                name: 'slow first attempt',
                async lookupPrice(symbol) {
                    const attempt = attempts.get(symbol) ?? 0;
                    attempts.set(symbol, attempt + 1);
                    active++;
                    maxActive = Math.max(maxActive, active);
                    // The first attempt outlives the timeout and never looks at the signal
                    await new Promise(resolve => setTimeout(resolve, attempt === 0 ? 20 : 0));
                    active--;
                    return 10;
                }
            };
            const resolver = new PriceResolverService(
                source,
                { ...policy, timeoutMs: 5, maxRetries: 1, concurrency: 1 },
                recordingSleep().sleep
            );

            const result = await resolver.resolve([makeSecurity('AAA'), makeSecurity('BBB'), makeSecurity('CCC')]);

            expect(result.resolvedCount).toBe(3);
            expect([...attempts.values()]).toEqual([2, 2, 2]);
            expect(maxActive).toBe(1);
        });
    });

    describe('backoffDelay', () => {
        it('should double the delay per attempt up to the cap', () => {
            const resolver = new PriceResolverService(new ScriptedPriceSource({}), policy);

            expect([0, 1, 2, 3, 4, 5].map(a => resolver.backoffDelay(a))).toEqual([100, 200, 400, 800, 1000, 1000]);
        });
    });

    describe('constructor', () => {
        const source = new ScriptedPriceSource({});

        it('should reject a non-positive timeout', () => {
            expect(() => new PriceResolverService(source, { ...policy, timeoutMs: 0 })).toThrow(InvalidInputError);
        });

        it('should reject a negative retry count', () => {
            expect(() => new PriceResolverService(source, { ...policy, maxRetries: -1 })).toThrow(InvalidInputError);
        });

        it('should reject a concurrency below one', () => {
            expect(() => new PriceResolverService(source, { ...policy, concurrency: 0 })).toThrow(InvalidInputError);
        });
    });
});
