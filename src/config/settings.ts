import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import { LOG_LEVELS } from '../utils/logger.js';

/**
 * Runtime settings, parsed once from the environment and passed explicitly
 * to the services that need them.
 */
export interface TrackerSettings {
    readonly port: number;
    readonly logLevel: (typeof LOG_LEVELS)[number];

    // Investment constraints (INR)
    readonly minInvestmentAmount: number;
    readonly maxInvestmentAmount: number;

    readonly priceFetch: PriceFetchSettings;

    readonly securitiesFile: string;
    readonly outputDir: string;
}

export interface PriceFetchSettings {
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly backoffBaseMs: number;
    readonly backoffCapMs: number;
    readonly concurrency: number;
    readonly sourceUrl: string;
    readonly exchangeSuffix: string;
}

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG']).default('INFO'),
    MIN_INVESTMENT_AMOUNT: z.coerce.number().positive().default(1_000),
    MAX_INVESTMENT_AMOUNT: z.coerce.number().positive().default(100_000_000),
    PRICE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    PRICE_FETCH_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    PRICE_FETCH_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1_000),
    PRICE_FETCH_BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(30_000),
    PRICE_FETCH_CONCURRENCY: z.coerce.number().int().positive().default(5),
    PRICE_SOURCE_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
    EXCHANGE_SUFFIX: z.string().default('.NS'),
    SECURITIES_FILE: z.string().min(1).default('data/nifty100_securities.csv'),
    OUTPUT_DIR: z.string().min(1).default('data/output')
});

/**
 * Parse settings from environment variables.
 * Unset variables fall back to defaults; invalid values throw InvalidInputError.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): TrackerSettings {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new InvalidInputError(`Invalid configuration: ${issues}`);
    }

    const e = parsed.data;
    if (e.MIN_INVESTMENT_AMOUNT > e.MAX_INVESTMENT_AMOUNT) {
        throw new InvalidInputError('Invalid configuration: MIN_INVESTMENT_AMOUNT exceeds MAX_INVESTMENT_AMOUNT');
    }

    return Object.freeze({
        port: e.PORT,
        logLevel: e.LOG_LEVEL,
        minInvestmentAmount: e.MIN_INVESTMENT_AMOUNT,
        maxInvestmentAmount: e.MAX_INVESTMENT_AMOUNT,
        priceFetch: Object.freeze({
            timeoutMs: e.PRICE_FETCH_TIMEOUT_MS,
            maxRetries: e.PRICE_FETCH_MAX_RETRIES,
            backoffBaseMs: e.PRICE_FETCH_BACKOFF_BASE_MS,
            backoffCapMs: e.PRICE_FETCH_BACKOFF_CAP_MS,
            concurrency: e.PRICE_FETCH_CONCURRENCY,
            sourceUrl: e.PRICE_SOURCE_URL,
            exchangeSuffix: e.EXCHANGE_SUFFIX
        }),
        securitiesFile: e.SECURITIES_FILE,
        outputDir: e.OUTPUT_DIR
    });
}
