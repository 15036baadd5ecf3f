import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { DomainError } from '../utils/errors';

export interface ErrorBody {
     error: string;
     message: string;
     details?: Record<string, unknown>;
}

export const errorResponseSchema = {
     type: 'object',
     properties: {
          error: { type: 'string' },
          message: { type: 'string' },
          details: { type: 'object', additionalProperties: true },
     },
} as const;

export function toErrorBody(error: DomainError): ErrorBody {
     return error.details
          ? { error: error.code, message: error.message, details: error.details }
          : { error: error.code, message: error.message };
}

/**
 * Sends a DomainError with its own status and code; anything else is logged
 * and reported as a 500 without leaking internals.
 */
export function sendRouteError(
     request: FastifyRequest,
     reply: FastifyReply,
     error: unknown,
     logMessage: string
): FastifyReply {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send(toErrorBody(error));
     }

     request.log.error({ err: error }, logMessage);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

// Schema validation failures and malformed JSON, in the same shape as domain errors
export function routeErrorHandler(
     error: FastifyError,
     request: FastifyRequest,
     reply: FastifyReply
): FastifyReply {
     if (error instanceof DomainError) {
          return sendRouteError(request, reply, error, 'Domain error');
     }
     if (error.validation) {
          return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
     }
     if (error.statusCode !== undefined && error.statusCode < 500) {
          return reply
               .code(error.statusCode)
               .send({ error: error.code || 'BAD_REQUEST', message: error.message });
     }
     return sendRouteError(request, reply, error, 'Unhandled route error');
}
