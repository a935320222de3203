import type { EntityMetadata } from '../mapping/entity.js';

export type EntityRow = {
  key: string;
  properties: Record<string, unknown>; // pg auto-parses JSONB
};

export function mapRow<T>(row: EntityRow, entity: EntityMetadata<T>): T {
  return entity.fromProperties(row.properties);
}
