import { Decimal } from 'decimal.js';
import { describe, expect, it, vi } from 'vitest';
import { LiveRateSource, type FetchLike } from '../src/fx/live.js';
import { MockRateSource } from '../src/fx/mock.js';
import { createRateSource } from '../src/fx/select.js';
import { RateSourceError, isRetryableFailure } from '../src/fx/types.js';

const fixedClock = () => new Date('2026-02-01T12:00:00.000Z');

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function liveSource(fetchImpl: FetchLike, pivotCurrency = 'EUR'): LiveRateSource {
    return new LiveRateSource({
        apiKey: 'test-key',
        baseUrl: 'http://rates.test/api/',
        pivotCurrency,
        fetchImpl,
        clock: fixedClock
    });
}

async function failureOf(promise: Promise<unknown>): Promise<string> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof RateSourceError) {
            return error.failure;
        }
        throw error;
    }
    throw new Error('expected a RateSourceError');
}

describe('MockRateSource', () => {
    it('returns the reference cross rate at the middle of the jitter band', async () => {
        const source = new MockRateSource({ random: () => 0.5, clock: fixedClock });
        const rate = await source.fetch({ source: 'GBP', target: 'EUR' });

        expect(rate.midRate.toString()).toBe('1.165');
        expect(rate.source).toBe('mock');
        expect(rate.fetchedAt).toEqual(fixedClock());
    });

    it('applies at most half a percent of jitter', async () => {
        const low = await new MockRateSource({ random: () => 0 }).fetch({ source: 'GBP', target: 'EUR' });
        const high = await new MockRateSource({ random: () => 0.999999 }).fetch({ source: 'GBP', target: 'EUR' });

        expect(low.midRate.toString()).toBe('1.159175');
        expect(high.midRate.lt(new Decimal('1.165').times('1.005'))).toBe(true);
        expect(high.midRate.gt('1.165')).toBe(true);
    });

    it('crosses through GBP for other pairs', async () => {
        const source = new MockRateSource({ random: () => 0.5 });

        expect((await source.fetch({ source: 'EUR', target: 'GBP' })).midRate.toString()).toBe('0.8583691');
        expect((await source.fetch({ source: 'USD', target: 'JPY' })).midRate.toString()).toBe('114.38679245');
    });

    it('lists the registry as symbols', async () => {
        const symbols = await new MockRateSource().listSymbols();
        expect(symbols.GBP).toBe('British Pound');
        expect(Object.keys(symbols)).toContain('ZAR');
    });
});

describe('LiveRateSource', () => {
    it('triangulates a cross rate through the pivot', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ success: true, rates: { GBP: 0.85, USD: 1.09 } }));
        const rate = await liveSource(fetchImpl).fetch({ source: 'GBP', target: 'USD' });

        expect(rate.midRate.toString()).toBe('1.28235294');
        expect(rate.source).toBe('live');
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(fetchImpl.mock.calls[0][0]).toBe(
            'http://rates.test/api/latest?access_key=test-key&base=EUR&symbols=GBP%2CUSD'
        );
    });

    it('uses the pivot rate directly or inverted when the pivot is on one side', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ success: true, rates: { GBP: 0.85, USD: 1.09 } }));
        const source = liveSource(fetchImpl);

        expect((await source.fetch({ source: 'EUR', target: 'USD' })).midRate.toString()).toBe('1.09');
        expect((await source.fetch({ source: 'GBP', target: 'EUR' })).midRate.toString()).toBe('1.17647059');
        expect(fetchImpl.mock.calls[0][0]).toContain('symbols=USD');
    });

    it('honours a configured pivot other than EUR', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ success: true, rates: { EUR: 1.165 } }));
        const rate = await liveSource(fetchImpl, 'gbp').fetch({ source: 'GBP', target: 'EUR' });

        expect(rate.midRate.toString()).toBe('1.165');
        expect(fetchImpl.mock.calls[0][0]).toContain('base=GBP');
    });

    it('maps upstream error payloads to failure kinds', async () => {
        const respond = (code: number, type: string) =>
            liveSource(async () => jsonResponse({ success: false, error: { code, type } })).fetch({ source: 'GBP', target: 'USD' });

        expect(await failureOf(respond(101, 'invalid_access_key'))).toBe('invalid_key');
        expect(await failureOf(respond(104, 'usage_limit_reached'))).toBe('rate_limited');
        expect(await failureOf(respond(106, 'rate_limit_reached'))).toBe('rate_limited');
        expect(await failureOf(respond(105, 'function_access_restricted'))).toBe('unavailable');
    });

    it('classifies error payloads that omit the success flag', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ error: { code: 101, type: 'invalid_access_key' } }));

        const failure = await failureOf(liveSource(fetchImpl).fetch({ source: 'GBP', target: 'USD' }));

        expect(failure).toBe('invalid_key');
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('maps HTTP statuses to failure kinds', async () => {
        const withStatus = (status: number) =>
            liveSource(async () => new Response('upstream says no', { status })).fetch({ source: 'GBP', target: 'USD' });

        expect(await failureOf(withStatus(401))).toBe('invalid_key');
        expect(await failureOf(withStatus(429))).toBe('rate_limited');
        expect(await failureOf(withStatus(503))).toBe('unavailable');
        expect(await failureOf(liveSource(async () => jsonResponse({ message: 'down' }, 500)).fetch({ source: 'GBP', target: 'USD' }))).toBe(
            'unavailable'
        );
    });

    it('reports thrown fetch errors as network failures', async () => {
        const source = liveSource(async () => {
            throw new TypeError('fetch failed');
        });

        const failure = await failureOf(source.fetch({ source: 'GBP', target: 'USD' }));
        expect(failure).toBe('network');
    });

    it('reports a missing rate as unavailable', async () => {
        const source = liveSource(async () => jsonResponse({ success: true, rates: { USD: 1.09 } }));
        expect(await failureOf(source.fetch({ source: 'GBP', target: 'USD' }))).toBe('unavailable');
    });

    it('lists upstream symbols', async () => {
        const fetchImpl = vi.fn<FetchLike>(async () =>
            jsonResponse({ success: true, symbols: { EUR: 'Euro', GBP: 'British Pound Sterling' } })
        );
        const symbols = await liveSource(fetchImpl).listSymbols();

        expect(symbols).toEqual({ EUR: 'Euro', GBP: 'British Pound Sterling' });
        expect(fetchImpl.mock.calls[0][0]).toBe('http://rates.test/api/symbols?access_key=test-key');
    });
});

describe('createRateSource', () => {
    const base = { baseUrl: 'http://rates.test/api', pivotCurrency: 'EUR' };

    it('selects the live source only when a key is set', () => {
        expect(createRateSource({ ...base, apiKey: 'test-key' }).kind).toBe('live');
        expect(createRateSource({ ...base }).kind).toBe('mock');
        expect(createRateSource({ ...base, apiKey: '   ' }).kind).toBe('mock');
    });
});

describe('isRetryableFailure', () => {
    it('retries only network and unavailable failures', () => {
        expect(isRetryableFailure(new RateSourceError('network', 'x'))).toBe(true);
        expect(isRetryableFailure(new RateSourceError('unavailable', 'x'))).toBe(true);
        expect(isRetryableFailure(new RateSourceError('rate_limited', 'x'))).toBe(false);
        expect(isRetryableFailure(new RateSourceError('invalid_key', 'x'))).toBe(false);
        expect(isRetryableFailure(new Error('x'))).toBe(false);
    });
});
