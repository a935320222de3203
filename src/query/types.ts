import type { NativeValue } from '../convert/native-types.js';

export type ComparisonOperator = 'eq' | 'gt' | 'ge' | 'lt' | 'le';

export type Filter =
  | { readonly kind: 'property'; readonly field: string; readonly op: ComparisonOperator; readonly value: NativeValue }
  | { readonly kind: 'and'; readonly filters: readonly Filter[] };

export type SortDirection = 'asc' | 'desc';

export interface OrderBy {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * In-memory structured query handed to the execution service.
 * Built exclusively via the structuredQuery builder, never serialized.
 */
export interface StructuredQuery {
  readonly kind: string;
  readonly filter: Filter | null;
  readonly orderBy: readonly OrderBy[];
  readonly limit: number | null;
}
