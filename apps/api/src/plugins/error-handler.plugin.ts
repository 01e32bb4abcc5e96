import { type FastifyInstance, type FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Error → HTTP mapping
//   schema validation   → 422 REQUEST_VALIDATION_FAILED
//   AppError            → its own status + code
//   other 4xx (Fastify) → passed through
//   anything else       → 500, generic message
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(422).send({
        error: {
          code: 'REQUEST_VALIDATION_FAILED',
          message: 'Request validation failed',
          ...(error.validation ? { details: error.validation } : {}),
        },
      });
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
        },
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({
      error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});

export { errorHandlerPlugin };
