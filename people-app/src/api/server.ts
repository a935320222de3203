import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';
import type { DatastoreOperations } from '../../../src/index.js';
import { createPeopleRepository } from '../repository.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerPeopleRoutes } from './routes/people.js';

/** Receives the server's logger so that datastore statements are logged with the requests. */
export type OperationsFactory = (log: FastifyBaseLogger) => DatastoreOperations;

export function buildServer(
  createOperations: OperationsFactory,
  logger: NonNullable<FastifyServerOptions['logger']> = true,
) {
  const app = Fastify({ logger });
  const operations = createOperations(app.log);
  const people = createPeopleRepository(operations);

  registerErrorHandler(app);

  app.addHook('onReady', async () => {
    await operations.initializeSchema();
  });
  app.addHook('onClose', async () => {
    await operations.close();
  });

  app.register(async (instance) => {
    await registerPeopleRoutes(instance, people);
  }, { prefix: '/api/v1' });

  return app;
}
