import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { DatastoreError, TooFewArgumentsError } from '../../../../src/index.js';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'ValidationError', issues: error.issues });
    }

    if (error instanceof TooFewArgumentsError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    // Backend failures → 500, logged with their cause
    if (error instanceof DatastoreError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors have a numeric `statusCode`: pass it through
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
