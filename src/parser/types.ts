export type PredicateOperator =
  | 'IS_NULL'
  | 'IS_NOT_NULL'
  | 'IS_EMPTY'
  | 'IS_NOT_EMPTY'
  | 'EQUALS'
  | 'NOT_EQUALS'
  | 'GREATER_THAN'
  | 'GREATER_THAN_OR_EQUAL'
  | 'LESS_THAN'
  | 'LESS_THAN_OR_EQUAL'
  | 'BETWEEN'
  | 'BEFORE'
  | 'AFTER'
  | 'LIKE'
  | 'NOT_LIKE'
  | 'STARTING_WITH'
  | 'ENDING_WITH'
  | 'CONTAINING'
  | 'NOT_CONTAINING'
  | 'IN'
  | 'NOT_IN'
  | 'NEAR'
  | 'WITHIN'
  | 'REGEX'
  | 'EXISTS'
  | 'TRUE'
  | 'FALSE';

/** One clause of a method name, e.g. `AgeGreaterThan`. */
export interface PredicatePart {
  /** Logical property name, uncapitalized (`age`). */
  readonly property: string;
  readonly operator: PredicateOperator;
  /** Number of positional arguments the clause consumes. */
  readonly argumentCount: number;
}

/** Parts combined with AND. Multiple groups are combined with OR. */
export type OrGroup = readonly PredicatePart[];

export type SortDirectionKeyword = 'ASC' | 'DESC';

export interface SortOrder {
  readonly property: string;
  readonly direction: SortDirectionKeyword;
}

export type SubjectKind = 'find' | 'count' | 'exists' | 'delete';

export interface ParsedMethodName {
  readonly methodName: string;
  readonly subject: SubjectKind;
  readonly distinct: boolean;
  /** Set by `First<N>` / `Top<N>`; null when the method does not limit. */
  readonly maxResults: number | null;
  readonly orGroups: readonly OrGroup[];
  readonly sort: readonly SortOrder[];
}
