import type { FastifyInstance } from 'fastify';
import { RelayError } from '../../common/errors/index.js';

/**
 * Global error handler.
 * Maps RelayError subclasses to their HTTP responses and passes Fastify's own
 * client errors (schema validation, malformed JSON) through with their status.
 * Anything else returns 500 with a generic message.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof RelayError) {
      reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
        },
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send({
        error: {
          code: error.validation ? 'VALIDATION_FAILED' : error.code,
          message: error.message,
        },
      });
      return;
    }

    // Unknown error: log full details, return generic message
    request.log.error({ err: error }, 'Unhandled error');
    reply.code(500).send({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });
}
