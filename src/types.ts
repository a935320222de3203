import type { EntityMetadata } from './mapping/entity.js';
import type { StructuredQuery } from './query/types.js';

/** Executes structured queries. The only capability a query method needs. */
export interface QueryOperations {
  /** Resolves to the mapped entities, or null when the backend returns no result set. */
  query<T>(query: StructuredQuery, entity: EntityMetadata<T>): Promise<Iterable<T> | null>;
}

export interface DatastoreOperations extends QueryOperations {
  /** Inserts or replaces the entity under its key. */
  save<T>(entity: EntityMetadata<T>, value: T): Promise<void>;
  initializeSchema(): Promise<void>;
  close(): Promise<void>;
}

/** Maps each realised entity to the shape the caller asked for. */
export type Projection<T, P> = (entity: T) => P;

/** Metadata of one repository query method. */
export interface QueryMethod<T, P> {
  readonly name: string;
  readonly projection: Projection<T, P>;
}

export type ResultShape = 'count' | 'exists' | 'entityList';

export type QueryResult<P> = number | boolean | P[];
