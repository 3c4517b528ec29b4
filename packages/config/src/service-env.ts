import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const decimalString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'Expected a non-negative decimal string such as 0.005.');

const currencyCode = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{3}$/, 'Expected an ISO 4217 currency code.'));

const paymentsApiSchema = z.object({
  PAYMENTS_API_PORT: z.coerce.number().int().min(1).max(65_535).default(3010),
  PAYMENTS_API_HOST: z.string().min(1).default('0.0.0.0'),
  FX_PROVIDER_API_KEY: optionalNonEmptyString,
  FX_PROVIDER_BASE_URL: z.string().url().default('http://data.fixer.io/api'),
  FX_PIVOT_CURRENCY: currencyCode.default('EUR'),
  FX_MARKUP_PERCENTAGE: decimalString
    .default('0.005')
    .refine((value) => Number(value) < 1, { message: 'FX_MARKUP_PERCENTAGE must be below 1.' }),
  FX_QUOTE_VALIDITY_SECONDS: z.coerce.number().int().min(1).max(3_600).default(120),
  FX_RATE_CACHE_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  FX_RATE_MAX_STALE_MS: z.coerce.number().int().positive().default(24 * 3600 * 1000),
  FX_SYMBOL_CACHE_TTL_MS: z.coerce.number().int().positive().default(24 * 3600 * 1000),
  FX_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(5_000),
  FX_FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FX_FETCH_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  QUOTE_USAGE_POLICY: z.enum(['reusable', 'single_use']).default('reusable'),
  PAYMENT_FEE_POLICY: z.enum(['flat', 'percentage']).default('flat'),
  PAYMENT_FLAT_FEE: decimalString.default('5.00'),
  PAYMENT_FEE_RATE: decimalString
    .default('0.001')
    .refine((value) => Number(value) < 1, { message: 'PAYMENT_FEE_RATE must be below 1.' })
});

export type PaymentsApiServiceEnv = z.infer<typeof paymentsApiSchema>;

export function loadPaymentsApiServiceEnv(input: NodeJS.ProcessEnv = process.env): PaymentsApiServiceEnv {
  return paymentsApiSchema.parse(input);
}
