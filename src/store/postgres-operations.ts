import pg from 'pg';
import { wrapValue, type NativeValue } from '../convert/native-types.js';
import { DatastoreError } from '../errors.js';
import type { EntityMetadata } from '../mapping/entity.js';
import type { StructuredQuery } from '../query/types.js';
import type { DatastoreOperations } from '../types.js';
import { compileEntityQuery, compileSaveEntity, type CompiledQuery } from './compiler.js';
import { mapRow, type EntityRow } from './row-mapper.js';
import { applySchema } from './schema.js';

/** Subset of the pino/Fastify logger the operations write to. */
export interface QueryLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
}

export interface DatastoreOperationsConfig {
  pool: pg.Pool;
  /** Receives every compiled statement at debug level. */
  logger?: QueryLogger;
}

export class PostgresDatastoreOperations implements DatastoreOperations {
  private readonly pool: pg.Pool;
  private readonly logger: QueryLogger | undefined;

  constructor(config: DatastoreOperationsConfig) {
    this.pool = config.pool;
    this.logger = config.logger;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async query<T>(query: StructuredQuery, entity: EntityMetadata<T>): Promise<T[]> {
    const result = await this.run<EntityRow>(compileEntityQuery(query), `query ${query.kind}`);
    return result.rows.map((row) => mapRow(row, entity));
  }

  async save<T>(entity: EntityMetadata<T>, value: T): Promise<void> {
    const fields = new Map<string, NativeValue>();
    for (const [field, raw] of Object.entries(entity.toProperties(value))) {
      fields.set(field, wrapValue(raw));
    }
    await this.run(compileSaveEntity(entity.kind, entity.keyOf(value), fields), `save ${entity.kind}`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<R extends pg.QueryResultRow>(
    compiled: CompiledQuery,
    operation: string,
  ): Promise<pg.QueryResult<R>> {
    this.logger?.debug({ sql: compiled.sql, params: compiled.params }, `datastore ${operation}`);
    try {
      return await this.pool.query<R>(compiled.sql, compiled.params);
    } catch (err) {
      throw new DatastoreError(`Failed to ${operation}: ${String(err)}`, err);
    }
  }
}
