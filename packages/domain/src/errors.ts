/**
 * Structured API Error Codes
 *
 * Centralized error code registry for consistent error responses from the
 * quoting and payment services. Each error has a unique code, default HTTP
 * status, and human-readable message. Domain errors below carry one of these
 * codes so the HTTP layer can map them without inspecting messages.
 */

export interface ApiErrorDefinition {
    code: string;
    status: number;
    message: string;
}

/** Structured API error that can be thrown from any route handler. */
export class ApiError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: unknown;

    constructor(def: ApiErrorDefinition, details?: unknown) {
        super(def.message);
        this.name = 'ApiError';
        this.code = def.code;
        this.status = def.status;
        this.details = details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

export const ERRORS = {
    // ── Identity ──
    ACTOR_REQUIRED: { code: 'ACTOR_REQUIRED', status: 401, message: 'x-actor-id header is required.' },

    // ── Validation ──
    INVALID_PAYLOAD: { code: 'INVALID_PAYLOAD', status: 400, message: 'Invalid request payload.' },
    VALIDATION_ERROR: { code: 'VALIDATION_ERROR', status: 400, message: 'Request failed validation.' },

    // ── Resource ──
    NOT_FOUND: { code: 'NOT_FOUND', status: 404, message: 'Resource not found.' },

    // ── Quotes ──
    QUOTE_NOT_FOUND: { code: 'QUOTE_NOT_FOUND', status: 404, message: 'Quote not found.' },
    QUOTE_EXPIRED: { code: 'QUOTE_EXPIRED', status: 409, message: 'Quote has expired. Request a new quote.' },
    QUOTE_ALREADY_USED: { code: 'QUOTE_ALREADY_USED', status: 409, message: 'Quote has already been used by another payment.' },

    // ── Payments ──
    PAYMENT_NOT_FOUND: { code: 'PAYMENT_NOT_FOUND', status: 404, message: 'Payment not found.' },
    INVALID_TRANSITION: { code: 'INVALID_TRANSITION', status: 409, message: 'Payment is in an invalid state for this action.' },
    SELF_APPROVAL_FORBIDDEN: { code: 'SELF_APPROVAL_FORBIDDEN', status: 403, message: 'A payment cannot be approved or rejected by its creator.' },
    ACTOR_NOT_PERMITTED: { code: 'ACTOR_NOT_PERMITTED', status: 403, message: 'Actor is not permitted to perform this action.' },
    EXECUTION_FAILED: { code: 'EXECUTION_FAILED', status: 502, message: 'Payment execution provider rejected the request.' },

    // ── Internal ──
    PERSISTENCE_ERROR: { code: 'PERSISTENCE_ERROR', status: 503, message: 'The request could not be stored. No changes were made.' },
    INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' }
} as const satisfies Record<string, ApiErrorDefinition>;

export type ErrorCode = keyof typeof ERRORS;

export class ValidationError extends Error {
    readonly code = 'VALIDATION_ERROR';

    constructor(message: string, readonly details?: unknown) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class QuoteExpiredError extends Error {
    readonly code = 'QUOTE_EXPIRED';

    constructor(quoteId: string, expiresAt: Date) {
        super(`Quote ${quoteId} expired at ${expiresAt.toISOString()}.`);
        this.name = 'QuoteExpiredError';
    }
}

/** Base for every rejected payment action; the payment is left unchanged. */
export abstract class StateTransitionError extends Error {
    abstract readonly code: 'INVALID_TRANSITION' | 'SELF_APPROVAL_FORBIDDEN' | 'ACTOR_NOT_PERMITTED';
}

export class InvalidTransitionError extends StateTransitionError {
    readonly code = 'INVALID_TRANSITION';

    constructor(readonly status: string, readonly action: string) {
        super(`Cannot ${action} a payment in status ${status}.`);
        this.name = 'InvalidTransitionError';
    }
}

export class SelfApprovalForbiddenError extends StateTransitionError {
    readonly code = 'SELF_APPROVAL_FORBIDDEN';

    constructor(paymentId: string, actorId: string) {
        super(`Actor ${actorId} created payment ${paymentId} and cannot approve or reject it.`);
        this.name = 'SelfApprovalForbiddenError';
    }
}

export class ActorNotPermittedError extends StateTransitionError {
    readonly code = 'ACTOR_NOT_PERMITTED';

    constructor(action: string, actorId: string) {
        super(`Actor ${actorId} is not permitted to ${action} this payment.`);
        this.name = 'ActorNotPermittedError';
    }
}

export class PersistenceError extends Error {
    readonly code = 'PERSISTENCE_ERROR';

    constructor(operation: string, cause: unknown) {
        super(`Store failure during ${operation}.`, { cause });
        this.name = 'PersistenceError';
    }
}

export function isErrorCode(value: unknown): value is ErrorCode {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ERRORS, value);
}
