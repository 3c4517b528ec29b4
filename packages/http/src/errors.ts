import { ApiError, ERRORS, isErrorCode, type ApiErrorDefinition } from '@fxdesk/domain';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

type RequestWithId = Pick<FastifyRequest, 'id'>;

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

/** Codes whose underlying message may carry internal detail and is replaced by the registry text. */
const OPAQUE_CODES: ReadonlySet<string> = new Set([ERRORS.PERSISTENCE_ERROR.code, ERRORS.EXECUTION_FAILED.code, ERRORS.INTERNAL_ERROR.code]);

export function errorEnvelope(request: RequestWithId, code: string, message: string, details?: unknown): ErrorBody {
  const error: ErrorBody['error'] = {
    code,
    message,
    requestId: request.id
  };

  if (details !== undefined) {
    error.details = details;
  }

  return { error };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  code: string;
  message: string;
  status?: number;
  details?: unknown;
}): FastifyReply {
  return params.reply.status(params.status ?? 400).send(errorEnvelope(params.request, params.code, params.message, params.details));
}

export interface ResolvedError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

function readCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

function readDetails(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'details' in error ? error.details : undefined;
}

/**
 * Map a thrown value onto the error registry. Anything without a registered
 * code becomes INTERNAL_ERROR with the generic message.
 */
export function resolveError(error: unknown): ResolvedError {
  if (error instanceof ApiError) {
    return { status: error.status, code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ZodError) {
    const definition: ApiErrorDefinition = ERRORS.INVALID_PAYLOAD;
    return { status: definition.status, code: definition.code, message: definition.message, details: error.flatten() };
  }

  const code = readCode(error);
  if (isErrorCode(code)) {
    const definition: ApiErrorDefinition = ERRORS[code];
    const message = !OPAQUE_CODES.has(code) && error instanceof Error ? error.message : definition.message;
    return { status: definition.status, code: definition.code, message, details: OPAQUE_CODES.has(code) ? undefined : readDetails(error) };
  }

  return {
    status: ERRORS.INTERNAL_ERROR.status,
    code: ERRORS.INTERNAL_ERROR.code,
    message: ERRORS.INTERNAL_ERROR.message
  };
}

export function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown): FastifyReply {
  const resolved = resolveError(error);
  return deny({ request, reply, status: resolved.status, code: resolved.code, message: resolved.message, details: resolved.details });
}

/**
 * Route every uncaught handler error through the registry. Server faults are
 * logged with the original error; client faults are not.
 */
export function registerErrorHandler(
  app: FastifyInstance,
  onServerError?: (error: unknown, request: FastifyRequest) => void
): void {
  app.setErrorHandler((error, request, reply) => {
    // Fastify's own body-parsing failures carry a 4xx statusCode but no registry code.
    if (!isErrorCode(readCode(error)) && typeof error.statusCode === 'number' && error.statusCode < 500) {
      return deny({ request, reply, status: error.statusCode, code: ERRORS.INVALID_PAYLOAD.code, message: ERRORS.INVALID_PAYLOAD.message });
    }

    const resolved = resolveError(error);
    if (resolved.status >= 500) {
      onServerError?.(error, request);
    }
    return deny({ request, reply, status: resolved.status, code: resolved.code, message: resolved.message, details: resolved.details });
  });

  app.setNotFoundHandler((request, reply) =>
    deny({ request, reply, status: ERRORS.NOT_FOUND.status, code: ERRORS.NOT_FOUND.code, message: ERRORS.NOT_FOUND.message })
  );
}
