import Decimal from 'decimal.js';

// Configure Decimal.js for currency arithmetic
Decimal.set({
    precision: 28,
    rounding: Decimal.ROUND_HALF_UP
});

/**
 * Round to 2 decimal places (INR currency)
 */
export function roundToCurrency(value: Decimal | number): number {
    const d = new Decimal(value);
    return d.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Round a percentage to 4 decimal places
 */
export function roundToPercent(value: Decimal | number): number {
    const d = new Decimal(value);
    return d.toDecimalPlaces(4, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Convert to Decimal for precise calculations
 */
export function toDecimal(value: number | string): Decimal {
    return new Decimal(value);
}

/**
 * Safely divide, returning 0 if divisor is 0
 */
export function safeDivide(numerator: number | Decimal, denominator: number | Decimal): Decimal {
    const num = new Decimal(numerator);
    const den = new Decimal(denominator);
    if (den.isZero()) {
        return new Decimal(0);
    }
    return num.dividedBy(den);
}

/**
 * Whole units affordable with an amount: floor(amount / price).
 * Returns 0 for a non-positive price.
 */
export function wholeUnits(amount: Decimal, price: Decimal): Decimal {
    if (price.lte(0)) {
        return new Decimal(0);
    }
    return amount.dividedToIntegerBy(price);
}

/**
 * Format currency for display, e.g. ₹1,00,000.00
 */
export function formatCurrency(value: number, currency: string = 'INR'): string {
    return new Intl.NumberFormat('en-IN', {
        style: 'currency',
        currency,
        minimumFractionDigits: 2,
        maximumFractionDigits: 2
    }).format(value);
}

/**
 * Format a fraction as a percentage for display, e.g. 0.966731 -> 96.67%
 */
export function formatPercent(value: number, fractionDigits: number = 2): string {
    return new Intl.NumberFormat('en-IN', {
        style: 'percent',
        minimumFractionDigits: fractionDigits,
        maximumFractionDigits: fractionDigits
    }).format(value);
}

export { Decimal };
