/**
 * Error handler mapping core errors onto HTTP responses.
 *
 * Every failure is answered with `{ success: false, error }` where `error`
 * is a StructuredError.
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { RemediationError, createStructuredError, httpStatusFor } from 'mendgraph-core';
import type { RemediationErrorCode } from 'mendgraph-core';

function codeForStatus(status: number): RemediationErrorCode {
  if (status === 404) return 'NOT_FOUND';
  if (status === 409) return 'INVALID_TRANSITION';
  if (status >= 400 && status < 500) return 'VALIDATION_FAILED';
  return 'PERSISTENCE_FAILED';
}

export function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error instanceof RemediationError) {
    const status = httpStatusFor(error.code);
    if (status >= 500) request.log.error({ err: error }, error.message);
    return reply.status(status).send({ success: false, error: error.toJSON() });
  }

  const status = error.statusCode ?? 500;
  if (status >= 500) request.log.error({ err: error }, 'Unhandled error');
  return reply.status(status).send({
    success: false,
    error: createStructuredError(codeForStatus(status), status >= 500 ? 'Internal server error' : error.message),
  });
}
