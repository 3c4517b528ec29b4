export { loadRuntimeConfig, type RuntimeConfig } from './env.js';
export { loadPaymentsApiServiceEnv, type PaymentsApiServiceEnv } from './service-env.js';
