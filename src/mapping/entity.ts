import { EntityDefinitionError, UnknownPropertyError } from '../errors.js';

/** Logical property name → physical storage field name, one entry per property. */
export type FieldMap<T> = { readonly [P in keyof T & string]-?: string };

/**
 * Complete definition of one entity kind.
 * Use defineEntity() to create validated metadata.
 */
export interface EntityDefinition<T> {
  /** Storage kind the entities are written under. */
  readonly kind: string;
  /** Property whose value becomes the entity key. */
  readonly idProperty: keyof T & string;
  readonly fields: FieldMap<T>;
  /**
   * Builds an entity from stored values keyed by logical property name.
   * Properties missing from storage are absent from `values`.
   */
  readonly hydrate: (values: Readonly<Record<string, unknown>>) => T;
}

export class EntityMetadata<T> {
  private readonly fieldsByProperty: ReadonlyMap<string, string>;

  constructor(private readonly definition: EntityDefinition<T>) {
    const byProperty = new Map<string, string>();
    let property: keyof T & string;
    for (property in definition.fields) {
      byProperty.set(property, definition.fields[property]);
    }
    this.fieldsByProperty = byProperty;
  }

  get kind(): string {
    return this.definition.kind;
  }

  get idProperty(): string {
    return this.definition.idProperty;
  }

  /** Resolves a logical property to its storage field; throws for unknown properties. */
  fieldName(property: string): string {
    const field = this.fieldsByProperty.get(property);
    if (field === undefined) {
      throw new UnknownPropertyError(this.definition.kind, property);
    }
    return field;
  }

  keyOf(entity: T): string {
    const key = entity[this.definition.idProperty];
    if (key === null || key === undefined) {
      throw new EntityDefinitionError(
        `Entity of kind "${this.definition.kind}" has no value for id property "${this.definition.idProperty}"`,
      );
    }
    return String(key);
  }

  /** Storage representation: field name → value. Undefined values are omitted. */
  toProperties(entity: T): Record<string, unknown> {
    const properties: Record<string, unknown> = {};
    let property: keyof T & string;
    for (property in this.definition.fields) {
      const value = entity[property];
      if (value !== undefined) {
        properties[this.definition.fields[property]] = value;
      }
    }
    return properties;
  }

  fromProperties(stored: Readonly<Record<string, unknown>>): T {
    const values: Record<string, unknown> = {};
    for (const [property, field] of this.fieldsByProperty) {
      if (Object.hasOwn(stored, field)) {
        values[property] = stored[field];
      }
    }
    return this.definition.hydrate(values);
  }
}

/**
 * Validates an EntityDefinition and returns its metadata.
 * Throws if the kind is empty, a field name is empty or used twice,
 * or the id property is not mapped.
 */
export function defineEntity<T>(def: EntityDefinition<T>): EntityMetadata<T> {
  if (!def.kind || def.kind.trim() === '') {
    throw new EntityDefinitionError('defineEntity: kind must be a non-empty string');
  }
  const seen = new Set<string>();
  let property: keyof T & string;
  for (property in def.fields) {
    const field = def.fields[property];
    if (field.trim() === '') {
      throw new EntityDefinitionError(
        `defineEntity: "${def.kind}.${property}" must map to a non-empty field name`,
      );
    }
    if (seen.has(field)) {
      throw new EntityDefinitionError(
        `defineEntity: field "${field}" is mapped more than once on "${def.kind}"`,
      );
    }
    seen.add(field);
  }
  if (!Object.hasOwn(def.fields, def.idProperty)) {
    throw new EntityDefinitionError(
      `defineEntity: id property "${def.idProperty}" is not mapped on "${def.kind}"`,
    );
  }
  return new EntityMetadata(def);
}
