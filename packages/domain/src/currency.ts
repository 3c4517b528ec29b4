/**
 * Currency registry and currency pairs.
 *
 * The registry is read once from `data/currencies.json`. It defines which
 * ISO 4217 codes can be quoted, their minor-unit precision, and the GBP-based
 * reference rates the synthetic rate source jitters around.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const currencyDefinitionSchema = z.object({
    /** ISO 4217 currency code. */
    code: z.string().regex(/^[A-Z]{3}$/),
    /** Human-readable name. */
    name: z.string().min(1),
    /** Minor-unit decimal places (2 for GBP, 0 for JPY). */
    decimals: z.number().int().min(0).max(4),
    /** Symbol for display. */
    symbol: z.string().min(1),
    /** Units of this currency per one GBP, used by the mock rate source. */
    mockRatePerGbp: z.string().regex(/^\d+(\.\d+)?$/)
});

export type CurrencyDefinition = z.infer<typeof currencyDefinitionSchema>;

export interface CurrencyPair {
    source: string;
    target: string;
}

function loadRegistry(): ReadonlyMap<string, CurrencyDefinition> {
    const raw = readFileSync(new URL('../data/currencies.json', import.meta.url), 'utf8');
    const definitions = z.array(currencyDefinitionSchema).parse(JSON.parse(raw));
    return new Map(definitions.map((definition) => [definition.code, definition]));
}

const CURRENCIES = loadRegistry();

// ── Helpers ──

export function getCurrency(code: string): CurrencyDefinition | undefined {
    return CURRENCIES.get(code.toUpperCase());
}

export function isKnownCurrency(code: string): boolean {
    return CURRENCIES.has(code.toUpperCase());
}

export function listCurrencies(): CurrencyDefinition[] {
    return [...CURRENCIES.values()];
}

/** Minor-unit precision, defaulting to 2 for codes outside the registry. */
export function minorUnits(code: string): number {
    return getCurrency(code)?.decimals ?? 2;
}

export function pairKey(pair: CurrencyPair): string {
    return `${pair.source}/${pair.target}`;
}

/**
 * Normalise and validate a pair. Unknown codes and identical source/target
 * are the only hard failures a quote request can produce.
 */
export function parseCurrencyPair(source: string, target: string): CurrencyPair {
    const normalizedSource = source.trim().toUpperCase();
    const normalizedTarget = target.trim().toUpperCase();

    for (const code of [normalizedSource, normalizedTarget]) {
        if (!isKnownCurrency(code)) {
            throw new ValidationError(`Unsupported currency: ${code || '(empty)'}.`, { currency: code });
        }
    }

    if (normalizedSource === normalizedTarget) {
        throw new ValidationError('Source and target currency must differ.', { currency: normalizedSource });
    }

    return { source: normalizedSource, target: normalizedTarget };
}
