import { DatastoreDataError } from '../errors.js';
import type { NativeValue } from '../convert/native-types.js';
import type { ComparisonOperator, Filter, OrderBy, StructuredQuery } from '../query/types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const SQL_OPERATORS: Record<ComparisonOperator, string> = {
  eq: '=',
  gt: '>',
  ge: '>=',
  lt: '<',
  le: '<=',
};

/**
 * Renders a NativeValue as JSONB text. Integers keep their exact digits;
 * timestamps and blobs are stored as ISO-8601 and base64 strings.
 */
export function toJsonText(value: NativeValue): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'string':
      return JSON.stringify(value.value);
    case 'integer':
      return value.value.toString();
    case 'double':
      if (!Number.isFinite(value.value)) {
        throw new DatastoreDataError(`Cannot store non-finite number ${value.value} as JSONB`);
      }
      return JSON.stringify(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'timestamp':
      return JSON.stringify(value.value.toISOString());
    case 'blob':
      return JSON.stringify(Buffer.from(value.value).toString('base64'));
  }
}

/** Builds the JSONB object text for a set of field → native value pairs. */
export function toJsonObjectText(fields: ReadonlyMap<string, NativeValue>): string {
  const members = [...fields].map(([field, value]) => `${JSON.stringify(field)}:${toJsonText(value)}`);
  return `{${members.join(',')}}`;
}

/**
 * Renders one filter as `properties -> $field::text <op> $value::jsonb`,
 * AND-ing child filters in order. Field names and values are both bound
 * parameters, numbered from the counter.
 */
function compileFilter(filter: Filter, params: unknown[], counter: { n: number }): string {
  if (filter.kind === 'property') {
    params.push(filter.field);
    counter.n += 1;
    const fieldRef = `$${counter.n}`;
    params.push(toJsonText(filter.value));
    counter.n += 1;
    return `properties -> ${fieldRef}::text ${SQL_OPERATORS[filter.op]} $${counter.n}::jsonb`;
  }

  // filter.kind === 'and'
  const parts = filter.filters.map((f) => compileFilter(f, params, counter));
  return `(${parts.join(' AND ')})`;
}

function compileOrderBy(orderBy: readonly OrderBy[], params: unknown[], counter: { n: number }): string {
  const keys = orderBy.map(({ field, direction }) => {
    params.push(field);
    counter.n += 1;
    return `properties -> $${counter.n}::text ${direction === 'asc' ? 'ASC' : 'DESC'}`;
  });
  return `ORDER BY ${keys.join(', ')}`;
}

/**
 * Compiles a StructuredQuery into a parameterised SELECT over the entities table.
 * Properties missing from a document compare as SQL NULL and never match a filter.
 */
export function compileEntityQuery(query: StructuredQuery): CompiledQuery {
  const params: unknown[] = [query.kind];
  const counter = { n: 1 };

  const lines = ['SELECT key, properties', 'FROM entities'];
  if (query.filter === null) {
    lines.push('WHERE kind = $1');
  } else {
    lines.push(`WHERE kind = $1 AND ${compileFilter(query.filter, params, counter)}`);
  }

  if (query.orderBy.length > 0) {
    lines.push(compileOrderBy(query.orderBy, params, counter));
  }

  if (query.limit !== null) {
    params.push(query.limit);
    counter.n += 1;
    lines.push(`LIMIT $${counter.n}`);
  }

  return { sql: lines.join('\n'), params };
}

/** Compiles an idempotent upsert of one entity document. */
export function compileSaveEntity(
  kind: string,
  key: string,
  fields: ReadonlyMap<string, NativeValue>,
): CompiledQuery {
  const sql = [
    'INSERT INTO entities (kind, key, properties)',
    'VALUES ($1, $2, $3::jsonb)',
    'ON CONFLICT (kind, key) DO UPDATE',
    'SET properties = EXCLUDED.properties, updated_at = NOW()',
  ].join('\n');
  return { sql, params: [kind, key, toJsonObjectText(fields)] };
}
