import { Decimal } from 'decimal.js';
import { roundRate, type CurrencyPair } from '@fxdesk/domain';
import { z } from 'zod';
import { RateSourceError, type FetchOptions, type FxRate, type RateSource, type RateSourceFailure } from './types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface LiveRateSourceOptions {
    apiKey: string;
    baseUrl: string;
    /** Currency the upstream quotes every rate against. */
    pivotCurrency: string;
    fetchImpl?: FetchLike;
    clock?: () => Date;
}

const upstreamErrorSchema = z.object({
    success: z.literal(false).optional(),
    error: z.object({
        code: z.number().int(),
        type: z.string().optional(),
        info: z.string().optional()
    })
});

const latestSchema = z.object({
    success: z.literal(true),
    rates: z.record(z.number().positive())
});

const symbolsSchema = z.object({
    success: z.literal(true),
    symbols: z.record(z.string())
});

function failureForUpstreamCode(code: number, type: string | undefined): RateSourceFailure {
    if (code === 101) {
        return 'invalid_key';
    }
    if (code === 104 || (type !== undefined && /rate_limit|usage_limit/.test(type))) {
        return 'rate_limited';
    }
    return 'unavailable';
}

function failureForHttpStatus(status: number): RateSourceFailure {
    if (status === 401 || status === 403) {
        return 'invalid_key';
    }
    if (status === 429) {
        return 'rate_limited';
    }
    return 'unavailable';
}

/**
 * Rate source backed by a Fixer-compatible HTTP API.
 *
 * The upstream publishes every rate against one pivot currency, so an
 * arbitrary pair is triangulated through it. Each call is a single attempt;
 * retries and timeouts belong to the caller.
 */
export class LiveRateSource implements RateSource {
    readonly kind = 'live' as const;
    private readonly baseUrl: string;
    private readonly pivot: string;
    private readonly fetchImpl: FetchLike;
    private readonly clock: () => Date;

    constructor(private readonly options: LiveRateSourceOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.pivot = options.pivotCurrency.toUpperCase();
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.clock = options.clock ?? (() => new Date());
    }

    async fetch(pair: CurrencyPair, options: FetchOptions = {}): Promise<FxRate> {
        const symbols = [...new Set([pair.source, pair.target].filter((code) => code !== this.pivot))];
        const params = new URLSearchParams({
            access_key: this.options.apiKey,
            base: this.pivot,
            symbols: symbols.join(',')
        });

        const body = await this.request(`/latest?${params.toString()}`, options.signal);
        const parsed = latestSchema.safeParse(body);
        if (!parsed.success) {
            throw new RateSourceError('unavailable', 'Upstream returned an unexpected rates payload.');
        }

        return {
            pair,
            midRate: roundRate(this.crossRate(pair, parsed.data.rates)),
            fetchedAt: this.clock(),
            source: this.kind
        };
    }

    async listSymbols(options: FetchOptions = {}): Promise<Record<string, string>> {
        const params = new URLSearchParams({ access_key: this.options.apiKey });
        const body = await this.request(`/symbols?${params.toString()}`, options.signal);
        const parsed = symbolsSchema.safeParse(body);
        if (!parsed.success) {
            throw new RateSourceError('unavailable', 'Upstream returned an unexpected symbols payload.');
        }
        return parsed.data.symbols;
    }

    private crossRate(pair: CurrencyPair, rates: Record<string, number>): Decimal {
        const pivotTo = (code: string): Decimal => {
            const value = rates[code];
            if (value === undefined) {
                throw new RateSourceError('unavailable', `Upstream has no rate for ${code}.`);
            }
            return new Decimal(String(value));
        };

        if (pair.source === this.pivot) {
            return pivotTo(pair.target);
        }
        if (pair.target === this.pivot) {
            return new Decimal(1).dividedBy(pivotTo(pair.source));
        }
        return pivotTo(pair.target).dividedBy(pivotTo(pair.source));
    }

    private async request(path: string, signal: AbortSignal | undefined): Promise<unknown> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}${path}`, { signal });
        } catch (error) {
            throw new RateSourceError('network', `Upstream request failed: ${describe(error)}`, { cause: error });
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            if (!response.ok) {
                throw new RateSourceError(failureForHttpStatus(response.status), `Upstream responded with status ${response.status}.`);
            }
            throw new RateSourceError('unavailable', 'Upstream returned a non-JSON body.', { cause: error });
        }

        const upstreamError = upstreamErrorSchema.safeParse(body);
        if (upstreamError.success) {
            const { code, type } = upstreamError.data.error;
            throw new RateSourceError(failureForUpstreamCode(code, type), `Upstream error ${code}${type ? ` (${type})` : ''}.`);
        }

        if (!response.ok) {
            throw new RateSourceError(failureForHttpStatus(response.status), `Upstream responded with status ${response.status}.`);
        }

        return body;
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
