import { wrapValue, type ValueAdapter } from '../convert/native-types.js';
import { UnsupportedPredicateOperatorError, UnsupportedQueryShapeError } from '../errors.js';
import type { EntityMetadata } from '../mapping/entity.js';
import { parseMethodName } from '../parser/method-name-parser.js';
import type { ParsedMethodName, PredicatePart } from '../parser/types.js';
import type { QueryMethod, QueryOperations, QueryResult, ResultShape } from '../types.js';
import { ArgumentCursor } from './argument-cursor.js';
import { CompositeFilter, OrderBy, PropertyFilter } from './builder.js';
import { structuredQuery } from './query-object.js';
import type { Filter, OrderBy as OrderByClause, StructuredQuery } from './types.js';

type FilterFactory = (field: string, cursor: ArgumentCursor, adapt: ValueAdapter) => Filter;

interface Clause {
  readonly property: string;
  readonly toFilter: FilterFactory;
}

export interface PartTreeQueryConfig<T, P> {
  readonly method: QueryMethod<T, P>;
  readonly operations: QueryOperations;
  readonly entity: EntityMetadata<T>;
  /** Adapts argument values before they are embedded in a filter. Defaults to wrapValue. */
  readonly valueAdapter?: ValueAdapter;
}

/**
 * Selects the filter for one clause. Every operator has an explicit case, so
 * adding one to PredicateOperator fails compilation here until it is handled.
 */
function filterFactoryFor(part: PredicatePart, methodName: string): FilterFactory {
  switch (part.operator) {
    // IS_EMPTY cannot be told apart from IS_NULL on this backend.
    case 'IS_NULL':
    case 'IS_EMPTY':
      return (field) => PropertyFilter.isNull(field);
    case 'EQUALS':
      return (field, cursor, adapt) => PropertyFilter.eq(field, adapt(cursor.next()));
    case 'GREATER_THAN_OR_EQUAL':
      return (field, cursor, adapt) => PropertyFilter.ge(field, adapt(cursor.next()));
    case 'GREATER_THAN':
      return (field, cursor, adapt) => PropertyFilter.gt(field, adapt(cursor.next()));
    case 'LESS_THAN_OR_EQUAL':
      return (field, cursor, adapt) => PropertyFilter.le(field, adapt(cursor.next()));
    case 'LESS_THAN':
      return (field, cursor, adapt) => PropertyFilter.lt(field, adapt(cursor.next()));
    case 'IS_NOT_NULL':
    case 'IS_NOT_EMPTY':
    case 'NOT_EQUALS':
    case 'BETWEEN':
    case 'BEFORE':
    case 'AFTER':
    case 'LIKE':
    case 'NOT_LIKE':
    case 'STARTING_WITH':
    case 'ENDING_WITH':
    case 'CONTAINING':
    case 'NOT_CONTAINING':
    case 'IN':
    case 'NOT_IN':
    case 'NEAR':
    case 'WITHIN':
    case 'REGEX':
    case 'EXISTS':
    case 'TRUE':
    case 'FALSE':
      throw new UnsupportedPredicateOperatorError(methodName, part.operator);
  }
}

function resultShapeOf(tree: ParsedMethodName): ResultShape {
  switch (tree.subject) {
    case 'count':
      return 'count';
    case 'exists':
      return 'exists';
    default:
      return 'entityList';
  }
}

/**
 * Query method derived from its name, e.g. `findByAgeGreaterThanAndActiveIsNull`.
 *
 * The name is parsed and validated once, on construction. Each execution binds
 * a fresh argument list positionally against the frozen clauses, runs the
 * resulting structured query and shapes the rows as a count, an existence
 * flag or a projected entity list.
 */
export class PartTreeDatastoreQuery<T, P = T> {
  readonly resultShape: ResultShape;
  private readonly tree: ParsedMethodName;
  private readonly clauses: readonly Clause[];
  private readonly method: QueryMethod<T, P>;
  private readonly operations: QueryOperations;
  private readonly entity: EntityMetadata<T>;
  private readonly valueAdapter: ValueAdapter;

  constructor(config: PartTreeQueryConfig<T, P>) {
    this.method = config.method;
    this.operations = config.operations;
    this.entity = config.entity;
    this.valueAdapter = config.valueAdapter ?? wrapValue;

    const tree = parseMethodName(config.method.name);
    if (tree.subject === 'delete') {
      throw new UnsupportedQueryShapeError(tree.methodName, 'delete');
    }
    if (tree.distinct) {
      throw new UnsupportedQueryShapeError(tree.methodName, 'distinct');
    }
    if (tree.orGroups.length > 1) {
      throw new UnsupportedQueryShapeError(tree.methodName, 'disjunction');
    }

    // Unknown properties fail here, at bind time, rather than on first call.
    const parts = tree.orGroups[0] ?? [];
    for (const { property } of [...parts, ...tree.sort]) {
      this.entity.fieldName(property);
    }

    this.tree = tree;
    this.clauses = Object.freeze(
      parts.map((part) =>
        Object.freeze({ property: part.property, toFilter: filterFactoryFor(part, tree.methodName) }),
      ),
    );
    this.resultShape = resultShapeOf(tree);
  }

  get methodName(): string {
    return this.tree.methodName;
  }

  async execute(args: readonly unknown[] = []): Promise<QueryResult<P>> {
    const results = await this.executeRawResult(args);
    switch (this.resultShape) {
      case 'count':
        return results.length;
      case 'exists':
        return results.length > 0;
      case 'entityList':
        return results.map((entity) => this.method.projection(entity));
    }
  }

  async executeRawResult(args: readonly unknown[] = []): Promise<T[]> {
    const found = await this.operations.query(this.compile(args), this.entity);
    return found === null ? [] : Array.from(found);
  }

  /** Builds the structured query for one invocation. */
  compile(args: readonly unknown[]): StructuredQuery {
    let builder = structuredQuery.ofKind(this.entity.kind);

    const filter = this.buildFilter(new ArgumentCursor(args, this.tree.methodName));
    if (filter !== null) {
      builder = builder.filter(filter);
    }

    const [primary, ...tieBreakers] = this.buildOrderBy();
    if (primary !== undefined) {
      builder = builder.orderBy(primary, ...tieBreakers);
    }

    if (this.tree.maxResults !== null) {
      builder = builder.limit(this.tree.maxResults);
    }

    return builder.build();
  }

  private buildFilter(cursor: ArgumentCursor): Filter | null {
    const [first, ...rest] = this.clauses.map((clause) =>
      clause.toFilter(this.entity.fieldName(clause.property), cursor, this.valueAdapter),
    );
    if (first === undefined) {
      return null;
    }
    return rest.length === 0 ? first : CompositeFilter.and(first, ...rest);
  }

  private buildOrderBy(): OrderByClause[] {
    return this.tree.sort.map(({ property, direction }) => {
      const field = this.entity.fieldName(property);
      return direction === 'ASC' ? OrderBy.asc(field) : OrderBy.desc(field);
    });
  }
}
