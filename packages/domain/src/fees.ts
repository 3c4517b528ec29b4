import { Decimal } from 'decimal.js';
import { toDecimal } from './money.js';

export interface FeeInput {
  /** Source-currency principal at full precision. */
  amount: Decimal;
  currency: string;
}

/** Pure function from principal to fee, both in the source currency. */
export type FeePolicy = (input: FeeInput) => Decimal;

export function flatFeePolicy(fee: Decimal.Value): FeePolicy {
  const amount = toDecimal(fee, 'fee');
  return () => amount;
}

export function percentageFeePolicy(rate: Decimal.Value, options: { minimum?: Decimal.Value } = {}): FeePolicy {
  const pct = toDecimal(rate, 'feeRate');
  const minimum = toDecimal(options.minimum ?? 0, 'minimumFee');
  return ({ amount }) => Decimal.max(amount.times(pct), minimum);
}

export const zeroFeePolicy: FeePolicy = () => new Decimal(0);

export const FEE_POLICY_KINDS = ['flat', 'percentage'] as const;
export type FeePolicyKind = (typeof FEE_POLICY_KINDS)[number];

export interface FeePolicyConfig {
  kind: FeePolicyKind;
  /** Charged per payment under `flat`. */
  flatFee: Decimal.Value;
  /** Fraction of the source principal under `percentage`, e.g. 0.001. */
  rate: Decimal.Value;
}

export function createFeePolicy(config: FeePolicyConfig): FeePolicy {
  switch (config.kind) {
    case 'flat':
      return flatFeePolicy(config.flatFee);
    case 'percentage':
      return percentageFeePolicy(config.rate);
  }
}
