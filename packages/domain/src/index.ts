export {
  actorId,
  allowedActions,
  HUMAN_PAYMENT_ACTIONS,
  planTransition,
  SYSTEM_PAYMENT_ACTIONS,
  systemActor,
  TRANSITIONS,
  userActor,
  type Actor,
  type ApprovalEvent,
  type HumanPaymentAction,
  type PaymentAction,
  type PlannedTransition,
  type SystemPaymentAction
} from './approval.js';
export {
  getCurrency,
  isKnownCurrency,
  listCurrencies,
  minorUnits,
  pairKey,
  parseCurrencyPair,
  type CurrencyDefinition,
  type CurrencyPair
} from './currency.js';
export {
  ActorNotPermittedError,
  ApiError,
  ERRORS,
  InvalidTransitionError,
  isErrorCode,
  PersistenceError,
  QuoteExpiredError,
  SelfApprovalForbiddenError,
  StateTransitionError,
  ValidationError,
  type ApiErrorDefinition,
  type ErrorCode
} from './errors.js';
export {
  FEE_POLICY_KINDS,
  createFeePolicy,
  flatFeePolicy,
  percentageFeePolicy,
  zeroFeePolicy,
  type FeeInput,
  type FeePolicy,
  type FeePolicyConfig,
  type FeePolicyKind
} from './fees.js';
export {
  formatAmount,
  formatRate,
  RATE_DECIMAL_PLACES,
  roundRate,
  roundToMinorUnits,
  toDecimal,
  toPositiveDecimal
} from './money.js';
export {
  buildPayment,
  isTerminalStatus,
  PAYMENT_DIRECTIONS,
  PAYMENT_STATUSES,
  TERMINAL_PAYMENT_STATUSES,
  type BuildPaymentInput,
  type Payment,
  type PaymentDirection,
  type PaymentStatus
} from './payment.js';
export {
  computeFinalRate,
  isQuoteExpired,
  parseMarkup,
  QUOTE_USAGE_POLICIES,
  RATE_ORIGINS,
  rateBreakdown,
  secondsRemaining,
  type Quote,
  type QuoteUsagePolicy,
  type RateBreakdown,
  type RateOrigin
} from './quote.js';
export { calculateBackoff, withRetry, withTimeout, type RetryOptions, type RetryResult } from './retry.js';
