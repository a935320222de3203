import pg from 'pg';
import { PostgresDatastoreOperations } from '../../src/index.js';
import { buildServer } from './api/server.js';
import { loadConfig, type AppConfig } from './config.js';

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = readConfig();

const app = buildServer(
  (log) =>
    new PostgresDatastoreOperations({
      pool: new pg.Pool({ connectionString: config.databaseUrl }),
      logger: log,
    }),
  { level: config.logLevel },
);

try {
  await app.listen({ port: config.port, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await app.close();
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close().catch((err: unknown) => app.log.error(err));
});
