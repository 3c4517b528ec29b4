export { LiveRateSource, type FetchLike, type LiveRateSourceOptions } from './live.js';
export { MockRateSource, type MockRateSourceOptions } from './mock.js';
export { createRateSource, type RateSourceConfig } from './select.js';
export {
    RATE_SOURCE_FAILURES,
    RateSourceError,
    isRetryableFailure,
    type FetchOptions,
    type FxRate,
    type RateSource,
    type RateSourceFailure,
    type RateSourceKind
} from './types.js';
