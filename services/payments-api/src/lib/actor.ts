import { ApiError, ERRORS } from '@fxdesk/domain';
import type { FastifyRequest } from 'fastify';

export const ACTOR_HEADER = 'x-actor-id';

/** Identity of the human caller, asserted by the upstream gateway. */
export function requireActor(request: FastifyRequest): string {
  const header = request.headers[ACTOR_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || value.trim().length === 0) {
    throw new ApiError(ERRORS.ACTOR_REQUIRED);
  }
  return value.trim();
}
