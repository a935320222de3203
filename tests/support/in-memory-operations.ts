import { wrapValue, type NativeValue } from '../../src/convert/native-types.js';
import type { EntityMetadata } from '../../src/mapping/entity.js';
import type { Filter, OrderBy, StructuredQuery } from '../../src/query/types.js';
import type { DatastoreOperations } from '../../src/types.js';

type Document = Record<string, unknown>;

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function numeric(value: NativeValue): number | bigint | null {
  if (value.type === 'integer' || value.type === 'double') return value.value;
  return null;
}

/** Orders two values of the same type; null when the types are not comparable. */
function compare(a: NativeValue, b: NativeValue): number | null {
  const left = numeric(a);
  const right = numeric(b);
  if (left !== null && right !== null) {
    if (typeof left === 'bigint' && typeof right === 'bigint') {
      return left < right ? -1 : left > right ? 1 : 0;
    }
    return sign(Number(left) - Number(right));
  }
  switch (a.type) {
    case 'null':
      return b.type === 'null' ? 0 : null;
    case 'string':
      if (b.type !== 'string') return null;
      return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
    case 'boolean':
      if (b.type !== 'boolean') return null;
      return sign(Number(a.value) - Number(b.value));
    case 'timestamp':
      if (b.type !== 'timestamp') return null;
      return sign(a.value.getTime() - b.value.getTime());
    case 'blob':
      if (b.type !== 'blob') return null;
      return Buffer.compare(a.value, b.value);
    default:
      return null;
  }
}

function matches(doc: Document, filter: Filter): boolean {
  if (filter.kind === 'and') {
    return filter.filters.every((f) => matches(doc, f));
  }
  if (!Object.hasOwn(doc, filter.field)) return false;
  const cmp = compare(wrapValue(doc[filter.field]), filter.value);
  if (cmp === null) return false;
  switch (filter.op) {
    case 'eq':
      return cmp === 0;
    case 'gt':
      return cmp > 0;
    case 'ge':
      return cmp >= 0;
    case 'lt':
      return cmp < 0;
    case 'le':
      return cmp <= 0;
  }
}

function byOrder(orderBy: readonly OrderBy[]) {
  return (a: Document, b: Document): number => {
    for (const { field, direction } of orderBy) {
      const cmp = compare(wrapValue(a[field]), wrapValue(b[field])) ?? 0;
      if (cmp !== 0) return direction === 'asc' ? cmp : -cmp;
    }
    return 0;
  };
}

/**
 * In-process stand-in for the datastore. Evaluates structured queries over
 * stored documents the way the backend does: missing properties never match
 * and entities lacking a sort property are left out of sorted results.
 */
export class InMemoryDatastoreOperations implements DatastoreOperations {
  readonly executed: StructuredQuery[] = [];
  private readonly kinds = new Map<string, Map<string, Document>>();

  async query<T>(query: StructuredQuery, entity: EntityMetadata<T>): Promise<T[]> {
    this.executed.push(query);
    const docs = [...(this.kinds.get(query.kind)?.values() ?? [])];
    let found = docs.filter((doc) => query.filter === null || matches(doc, query.filter));
    if (query.orderBy.length > 0) {
      found = found
        .filter((doc) => query.orderBy.every(({ field }) => Object.hasOwn(doc, field)))
        .sort(byOrder(query.orderBy));
    }
    if (query.limit !== null) {
      found = found.slice(0, query.limit);
    }
    return found.map((doc) => entity.fromProperties(doc));
  }

  async save<T>(entity: EntityMetadata<T>, value: T): Promise<void> {
    let docs = this.kinds.get(entity.kind);
    if (docs === undefined) {
      docs = new Map();
      this.kinds.set(entity.kind, docs);
    }
    docs.set(entity.keyOf(value), entity.toProperties(value));
  }

  async initializeSchema(): Promise<void> {}

  async close(): Promise<void> {
    this.kinds.clear();
  }
}
