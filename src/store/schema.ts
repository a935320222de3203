import type pg from 'pg';

export const DDL_CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS entities (
  kind        VARCHAR(255) NOT NULL,
  key         TEXT         NOT NULL,
  properties  JSONB        NOT NULL,
  updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
  PRIMARY KEY (kind, key)
)
`.trim();

export const DDL_CREATE_GIN_INDEX = `
CREATE INDEX IF NOT EXISTS idx_entities_properties_gin
  ON entities USING GIN (properties jsonb_path_ops)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_TABLE);
  await client.query(DDL_CREATE_GIN_INDEX);
}
