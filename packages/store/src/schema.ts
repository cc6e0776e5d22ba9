export const DATASET_TABLE = "sampler_datasets";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${DATASET_TABLE} (
  name TEXT PRIMARY KEY,
  columns TEXT[] NOT NULL,
  rows JSONB NOT NULL DEFAULT '[]'::jsonb,
  row_count INTEGER NOT NULL DEFAULT 0,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;
