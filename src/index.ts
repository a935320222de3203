export { PartTreeDatastoreQuery } from './query/part-tree-query.js';
export type { PartTreeQueryConfig } from './query/part-tree-query.js';
export { structuredQuery } from './query/query-object.js';
export { PropertyFilter, CompositeFilter, OrderBy } from './query/builder.js';
export type { Filter, ComparisonOperator, SortDirection, StructuredQuery } from './query/types.js';
export { parseMethodName } from './parser/method-name-parser.js';
export type {
  ParsedMethodName,
  PredicateOperator,
  PredicatePart,
  OrGroup,
  SortOrder,
  SubjectKind,
} from './parser/types.js';
export { defineEntity, EntityMetadata } from './mapping/entity.js';
export type { EntityDefinition, FieldMap } from './mapping/entity.js';
export { wrapValue } from './convert/native-types.js';
export type { NativeValue, NativeType, ValueAdapter } from './convert/native-types.js';
export { DatastoreRepository } from './repository/repository.js';
export type { RepositoryConfig } from './repository/repository.js';
export { PostgresDatastoreOperations } from './store/postgres-operations.js';
export type { DatastoreOperationsConfig, QueryLogger } from './store/postgres-operations.js';
export type {
  QueryOperations,
  DatastoreOperations,
  QueryMethod,
  Projection,
  ResultShape,
  QueryResult,
} from './types.js';
export {
  UnsupportedQueryShapeError,
  UnsupportedPredicateOperatorError,
  TooFewArgumentsError,
  UnknownPropertyError,
  InvalidMethodNameError,
  EntityDefinitionError,
  DatastoreDataError,
  DatastoreError,
} from './errors.js';
export type { UnsupportedShapeReason } from './errors.js';
