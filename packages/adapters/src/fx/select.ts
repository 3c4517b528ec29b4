import { LiveRateSource, type FetchLike } from './live.js';
import { MockRateSource } from './mock.js';
import type { RateSource } from './types.js';

export interface RateSourceConfig {
    apiKey?: string;
    baseUrl: string;
    pivotCurrency: string;
    fetchImpl?: FetchLike;
}

/** Live when a credential is configured, otherwise Mock. */
export function createRateSource(config: RateSourceConfig): RateSource {
    if (config.apiKey && config.apiKey.trim().length > 0) {
        return new LiveRateSource({
            apiKey: config.apiKey,
            baseUrl: config.baseUrl,
            pivotCurrency: config.pivotCurrency,
            fetchImpl: config.fetchImpl
        });
    }
    return new MockRateSource();
}
