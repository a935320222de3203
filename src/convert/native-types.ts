import { DatastoreDataError } from '../errors.js';

/**
 * Datastore-native representation of a single property value.
 * Every value embedded in a filter goes through this union first.
 */
export type NativeValue =
  | { readonly type: 'null' }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'integer'; readonly value: bigint }
  | { readonly type: 'double'; readonly value: number }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'timestamp'; readonly value: Date }
  | { readonly type: 'blob'; readonly value: Uint8Array };

export type NativeType = NativeValue['type'];

/** Adapts an arbitrary argument value into a NativeValue. */
export type ValueAdapter = (value: unknown) => NativeValue;

const NULL_VALUE: NativeValue = { type: 'null' };

export function wrapValue(value: unknown): NativeValue {
  if (value === null || value === undefined) {
    return NULL_VALUE;
  }
  switch (typeof value) {
    case 'string':
      return { type: 'string', value };
    case 'boolean':
      return { type: 'boolean', value };
    case 'bigint':
      return { type: 'integer', value };
    case 'number':
      if (Number.isSafeInteger(value)) {
        return { type: 'integer', value: BigInt(value) };
      }
      if (!Number.isFinite(value)) {
        throw new DatastoreDataError(`Unable to convert non-finite number ${value} to a native value`);
      }
      return { type: 'double', value };
    default:
      break;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new DatastoreDataError('Unable to convert an invalid Date to a native value');
    }
    return { type: 'timestamp', value };
  }
  if (value instanceof Uint8Array) {
    return { type: 'blob', value };
  }
  throw new DatastoreDataError(
    `Unable to convert ${describe(value)} to a native value: supported types are string, ` +
      'number, bigint, boolean, Date, Uint8Array and null',
  );
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
