import { z } from 'zod';
import { InvalidInputError } from '../errors.js';

export type PriceOrigin = 'input' | 'live';

/**
 * Security - one constituent of the tracked index.
 * Either unresolved (no price) or resolved with a price > 0.
 */
export interface Security {
    readonly symbol: string;
    readonly companyName: string;
    readonly isin?: string;
    readonly industry?: string;
    readonly series?: string;

    // Informational only; allocation is always equal weight
    readonly marketCap?: number;
    readonly weightage?: number;

    readonly currentPrice?: number;
    readonly resolved: boolean;
    readonly priceOrigin?: PriceOrigin;
}

const optionalText = z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined));

export const SecurityInputSchema = z.object({
    symbol: z.string().trim().min(1, 'Symbol cannot be empty').max(30),
    companyName: z.string().trim().min(1, 'Company name cannot be empty'),
    isin: optionalText,
    industry: optionalText,
    series: optionalText,
    marketCap: z.number().min(0).optional(),
    weightage: z.number().min(0, 'Weightage cannot be negative').optional(),
    currentPrice: z.number().finite().optional()
});

export type SecurityInput = z.input<typeof SecurityInputSchema>;

/**
 * Build a Security from an input record.
 * A positive currentPrice in the input marks it resolved from input data;
 * a zero or negative one is dropped and the security stays unresolved.
 */
export function createSecurity(input: unknown): Security {
    const parsed = SecurityInputSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => issue.message).join('; ');
        throw new InvalidInputError(`Invalid security record: ${issues}`);
    }

    const { currentPrice, ...rest } = parsed.data;
    const base: Security = { ...rest, resolved: false };

    return currentPrice !== undefined && currentPrice > 0
        ? { ...base, currentPrice, resolved: true, priceOrigin: 'input' }
        : base;
}

/**
 * Return a resolved copy of a security
 */
export function withResolvedPrice(security: Security, price: number, origin: PriceOrigin = 'live'): Security {
    if (!Number.isFinite(price) || price <= 0) {
        throw new InvalidInputError(`Invalid price for ${security.symbol}: ${price}`);
    }
    return { ...security, currentPrice: price, resolved: true, priceOrigin: origin };
}

export function isPriceAvailable(security: Security): security is Security & { currentPrice: number } {
    return security.resolved && security.currentPrice !== undefined && security.currentPrice > 0;
}

export function normalizeSymbol(symbol: string): string {
    return symbol.trim().toUpperCase();
}

export function describeSecurity(security: Security): string {
    return `${security.symbol} - ${security.companyName}`;
}
