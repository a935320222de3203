import { StructuredQueryBuilder } from './builder.js';

/**
 * Entry point for the structured-query builder.
 *
 * @example
 * structuredQuery.ofKind('Person')
 *   .filter(CompositeFilter.and(PropertyFilter.gt('age', wrapValue(21)), PropertyFilter.isNull('active')))
 *   .orderBy(OrderBy.desc('age'))
 *   .limit(10)
 *   .build()
 */
export const structuredQuery = {
  ofKind(kind: string): StructuredQueryBuilder {
    return new StructuredQueryBuilder({ kind, filter: null, orderBy: [], limit: null });
  },
};
