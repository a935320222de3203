import type { NativeValue } from '../convert/native-types.js';
import type { ComparisonOperator, Filter, OrderBy as OrderByClause, StructuredQuery } from './types.js';

function propertyFilter(field: string, op: ComparisonOperator, value: NativeValue): Filter {
  return { kind: 'property', field, op, value };
}

export const PropertyFilter = {
  eq: (field: string, value: NativeValue): Filter => propertyFilter(field, 'eq', value),
  gt: (field: string, value: NativeValue): Filter => propertyFilter(field, 'gt', value),
  ge: (field: string, value: NativeValue): Filter => propertyFilter(field, 'ge', value),
  lt: (field: string, value: NativeValue): Filter => propertyFilter(field, 'lt', value),
  le: (field: string, value: NativeValue): Filter => propertyFilter(field, 'le', value),
  /** Matches entities whose property is present and explicitly null. */
  isNull: (field: string): Filter => propertyFilter(field, 'eq', { type: 'null' }),
};

export const CompositeFilter = {
  /** Conjunction of one or more filters; children keep the given order. */
  and: (first: Filter, ...rest: Filter[]): Filter => ({ kind: 'and', filters: [first, ...rest] }),
};

export const OrderBy = {
  asc: (field: string): OrderByClause => ({ field, direction: 'asc' }),
  desc: (field: string): OrderByClause => ({ field, direction: 'desc' }),
};

export interface BuilderState {
  readonly kind: string;
  readonly filter: Filter | null;
  readonly orderBy: readonly OrderByClause[];
  readonly limit: number | null;
}

/**
 * Fluent immutable structured-query builder. Every operation returns a
 * new StructuredQueryBuilder; existing instances are never mutated.
 */
export class StructuredQueryBuilder {
  constructor(private readonly state: BuilderState) {}

  /** Replace the filter. */
  filter(filter: Filter): StructuredQueryBuilder {
    return new StructuredQueryBuilder({ ...this.state, filter });
  }

  /** Replace the sort order; the first key is primary, the rest break ties. */
  orderBy(first: OrderByClause, ...rest: OrderByClause[]): StructuredQueryBuilder {
    return new StructuredQueryBuilder({ ...this.state, orderBy: [first, ...rest] });
  }

  limit(limit: number): StructuredQueryBuilder {
    return new StructuredQueryBuilder({ ...this.state, limit });
  }

  build(): StructuredQuery {
    return Object.freeze({
      kind: this.state.kind,
      filter: this.state.filter,
      orderBy: Object.freeze([...this.state.orderBy]),
      limit: this.state.limit,
    });
  }
}
