import type { Decimal } from 'decimal.js';
import type { CurrencyPair } from '@fxdesk/domain';

export const RATE_SOURCE_FAILURES = ['unavailable', 'rate_limited', 'invalid_key', 'network'] as const;
export type RateSourceFailure = (typeof RATE_SOURCE_FAILURES)[number];

/** Upstream could not produce a rate. Absorbed by the quote engine's fallback chain. */
export class RateSourceError extends Error {
    constructor(readonly failure: RateSourceFailure, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RateSourceError';
    }
}

export type RateSourceKind = 'live' | 'mock';

export interface FxRate {
    pair: CurrencyPair;
    /** Mid-market units of `pair.target` per one unit of `pair.source`, 8 dp. */
    midRate: Decimal;
    fetchedAt: Date;
    source: RateSourceKind;
}

export interface FetchOptions {
    signal?: AbortSignal;
}

export interface RateSource {
    readonly kind: RateSourceKind;
    /** Mid rate for a pair. Rejects with RateSourceError only. */
    fetch(pair: CurrencyPair, options?: FetchOptions): Promise<FxRate>;
    /** Supported currency codes mapped to display names. */
    listSymbols(options?: FetchOptions): Promise<Record<string, string>>;
}

export function isRetryableFailure(error: unknown): boolean {
    return error instanceof RateSourceError && (error.failure === 'network' || error.failure === 'unavailable');
}
