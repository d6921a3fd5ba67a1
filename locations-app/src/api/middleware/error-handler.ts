import type { FastifyInstance } from 'fastify';
import { ConfigurationError, ModificationRejectedError, RecordStoreError } from 'film-locations-query';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Write intent → 403, message passed through verbatim
    if (error instanceof ModificationRejectedError) {
      return reply.status(403).send({
        error: error.name,
        message: error.message,
        requestedOperation: error.requestedOperation,
      });
    }

    // Query could not be resolved against the dataset → 422
    if (error instanceof ConfigurationError) {
      return reply.status(422).send({ error: error.name, message: error.message });
    }

    // Infrastructure errors → 500
    if (error instanceof RecordStoreError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors (bad JSON, unsupported media type) carry their own statusCode
    const statusCode = 'statusCode' in error ? error.statusCode : undefined;
    if (typeof statusCode === 'number') {
      return reply.status(statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
