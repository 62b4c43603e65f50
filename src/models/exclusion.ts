import { z } from 'zod';
import { InvalidInputError } from '../errors.js';
import { normalizeSymbol } from './security.js';

/**
 * ExclusionEntry - removes a security from the working set when either the
 * symbol (case-insensitive) or the ISIN (exact) matches.
 */
export interface ExclusionEntry {
    readonly symbol: string;
    readonly isin?: string;
}

export const ExclusionInputSchema = z
    .object({
        symbol: z.string().trim().default(''),
        isin: z
            .string()
            .trim()
            .optional()
            .transform(value => (value ? value : undefined))
    })
    .refine(entry => entry.symbol.length > 0 || entry.isin !== undefined, {
        message: 'Exclusion entry needs a symbol or an ISIN'
    });

export function createExclusionEntry(input: unknown): ExclusionEntry {
    const parsed = ExclusionInputSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => issue.message).join('; ');
        throw new InvalidInputError(`Invalid exclusion entry: ${issues}`);
    }
    return parsed.data;
}

/**
 * Lookup sets for matching securities against a list of exclusions
 */
export interface ExclusionIndex {
    readonly symbols: ReadonlySet<string>;
    readonly isins: ReadonlySet<string>;
}

export function buildExclusionIndex(exclusions: readonly ExclusionEntry[]): ExclusionIndex {
    const symbols = new Set<string>();
    const isins = new Set<string>();

    for (const entry of exclusions) {
        const symbol = normalizeSymbol(entry.symbol);
        if (symbol) symbols.add(symbol);

        const isin = entry.isin?.trim();
        if (isin) isins.add(isin);
    }

    return { symbols, isins };
}

export function matchesExclusion(
    security: { symbol: string; isin?: string },
    index: ExclusionIndex
): boolean {
    if (index.symbols.has(normalizeSymbol(security.symbol))) {
        return true;
    }
    const isin = security.isin?.trim();
    return isin !== undefined && isin.length > 0 && index.isins.has(isin);
}
