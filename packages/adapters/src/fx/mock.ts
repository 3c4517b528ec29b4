import { Decimal } from 'decimal.js';
import { getCurrency, listCurrencies, roundRate, type CurrencyPair } from '@fxdesk/domain';
import { RateSourceError, type FxRate, type RateSource } from './types.js';

export interface MockRateSourceOptions {
    /** Half-width of the jitter band as a fraction, default 0.005 (±0.5%). */
    jitter?: number;
    /** Uniform source in [0, 1). */
    random?: () => number;
    clock?: () => Date;
}

/**
 * Synthetic rates derived from the registry's per-GBP reference table, moved
 * by a bounded random jitter on every fetch. Never calls out of process.
 */
export class MockRateSource implements RateSource {
    readonly kind = 'mock' as const;
    private readonly jitter: Decimal;
    private readonly random: () => number;
    private readonly clock: () => Date;

    constructor(options: MockRateSourceOptions = {}) {
        this.jitter = new Decimal(options.jitter ?? 0.005);
        this.random = options.random ?? Math.random;
        this.clock = options.clock ?? (() => new Date());
    }

    /** Reference cross rate before jitter. */
    referenceRate(pair: CurrencyPair): Decimal {
        const source = getCurrency(pair.source);
        const target = getCurrency(pair.target);
        if (!source || !target) {
            throw new RateSourceError('unavailable', `Mock rates have no entry for ${pair.source}/${pair.target}.`);
        }
        return new Decimal(target.mockRatePerGbp).dividedBy(source.mockRatePerGbp);
    }

    async fetch(pair: CurrencyPair): Promise<FxRate> {
        // random() in [0, 1) maps to a factor in [1 - jitter, 1 + jitter)
        const factor = new Decimal(1).plus(this.jitter.times(new Decimal(this.random()).times(2).minus(1)));

        return {
            pair,
            midRate: roundRate(this.referenceRate(pair).times(factor)),
            fetchedAt: this.clock(),
            source: this.kind
        };
    }

    async listSymbols(): Promise<Record<string, string>> {
        return Object.fromEntries(listCurrencies().map((currency) => [currency.code, currency.name]));
    }
}
