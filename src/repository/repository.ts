import type { ValueAdapter } from '../convert/native-types.js';
import { DatastoreDataError } from '../errors.js';
import type { EntityMetadata } from '../mapping/entity.js';
import { PartTreeDatastoreQuery } from '../query/part-tree-query.js';
import type { DatastoreOperations, Projection } from '../types.js';

export interface RepositoryConfig<T> {
  operations: DatastoreOperations;
  entity: EntityMetadata<T>;
  valueAdapter?: ValueAdapter;
}

/**
 * Repository of derived query methods for one entity kind. Each method name
 * is parsed once, on first use or via prepare(), and reused afterwards.
 */
export class DatastoreRepository<T> {
  private readonly queries = new Map<string, PartTreeDatastoreQuery<T>>();

  constructor(private readonly config: RepositoryConfig<T>) {}

  /** Builds the given methods now so invalid names fail at startup. */
  prepare(...methodNames: string[]): this {
    for (const name of methodNames) {
      this.method(name);
    }
    return this;
  }

  method(name: string): PartTreeDatastoreQuery<T> {
    const cached = this.queries.get(name);
    if (cached !== undefined) return cached;
    const query = new PartTreeDatastoreQuery<T>({
      ...this.queryConfig(),
      method: { name, projection: (entity: T) => entity },
    });
    this.queries.set(name, query);
    return query;
  }

  /** A projected variant of a method. Not cached: the projection is part of its identity. */
  projected<P>(name: string, projection: Projection<T, P>): PartTreeDatastoreQuery<T, P> {
    return new PartTreeDatastoreQuery<T, P>({ ...this.queryConfig(), method: { name, projection } });
  }

  async find(name: string, ...args: unknown[]): Promise<T[]> {
    const result = await this.method(name).execute(args);
    if (!Array.isArray(result)) {
      throw new DatastoreDataError(`Query method ${name} does not return an entity list`);
    }
    return result;
  }

  async count(name: string, ...args: unknown[]): Promise<number> {
    const result = await this.method(name).execute(args);
    if (typeof result !== 'number') {
      throw new DatastoreDataError(`Query method ${name} does not return a count`);
    }
    return result;
  }

  async exists(name: string, ...args: unknown[]): Promise<boolean> {
    const result = await this.method(name).execute(args);
    if (typeof result !== 'boolean') {
      throw new DatastoreDataError(`Query method ${name} does not return an existence flag`);
    }
    return result;
  }

  async save(entity: T): Promise<void> {
    await this.config.operations.save(this.config.entity, entity);
  }

  private queryConfig() {
    const { operations, entity, valueAdapter } = this.config;
    return valueAdapter === undefined ? { operations, entity } : { operations, entity, valueAdapter };
  }
}
