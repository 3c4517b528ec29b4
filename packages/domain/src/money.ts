import { Decimal } from 'decimal.js';
import { minorUnits } from './currency.js';
import { ValidationError } from './errors.js';

/** Rates are carried and stored with eight decimal places. */
export const RATE_DECIMAL_PLACES = 8;

/**
 * Parse a monetary or rate input into a Decimal. Numbers are accepted only
 * through their shortest decimal text so binary float artefacts never leak in.
 */
export function toDecimal(value: Decimal.Value, field = 'amount'): Decimal {
    let parsed: Decimal;
    try {
        parsed = new Decimal(typeof value === 'number' ? String(value) : value);
    } catch {
        throw new ValidationError(`${field} is not a valid decimal number.`, { field });
    }

    if (!parsed.isFinite()) {
        throw new ValidationError(`${field} must be finite.`, { field });
    }

    return parsed;
}

export function toPositiveDecimal(value: Decimal.Value, field = 'amount'): Decimal {
    const parsed = toDecimal(value, field);
    if (parsed.lte(0)) {
        throw new ValidationError(`${field} must be greater than zero.`, { field });
    }
    return parsed;
}

/** Round half-even to the minor units of `currency`. */
export function roundToMinorUnits(amount: Decimal, currency: string): Decimal {
    return amount.toDecimalPlaces(minorUnits(currency), Decimal.ROUND_HALF_EVEN);
}

export function roundRate(rate: Decimal): Decimal {
    return rate.toDecimalPlaces(RATE_DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN);
}

/** Fixed-point text for display and JSON, e.g. `1165.80` or `145`. */
export function formatAmount(amount: Decimal, currency: string): string {
    return amount.toFixed(minorUnits(currency), Decimal.ROUND_HALF_EVEN);
}

export function formatRate(rate: Decimal): string {
    return rate.toFixed(RATE_DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN);
}
