import type { Cell, Row, Table, TableStore } from "@sampler/types";
import { z } from "zod";
import type { SqlExecutor } from "./client.js";
import { DATASET_TABLE, SCHEMA_SQL } from "./schema.js";

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const datasetRowSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(cellSchema)),
});

/**
 * Keeps each dataset as one row of `sampler_datasets`: the column list plus
 * the cells as a JSON matrix. A save is a single upsert, so readers see
 * either the previous table or the new one.
 */
export class PostgresTableStore implements TableStore {
  constructor(private readonly db: SqlExecutor) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(SCHEMA_SQL);
  }

  async load(name: string): Promise<Table | undefined> {
    const result = await this.db.query(
      `SELECT columns, rows FROM ${DATASET_TABLE} WHERE name = $1`,
      [name],
    );

    const first = result.rows[0];
    if (first === undefined) {
      return undefined;
    }

    const dataset = datasetRowSchema.parse(first);
    const rows: Row[] = dataset.rows.map((cells, index) => {
      if (cells.length !== dataset.columns.length) {
        throw new Error(
          `Dataset '${name}' row ${index} has ${cells.length} cells for ${dataset.columns.length} columns`,
        );
      }
      const row: Record<string, Cell> = {};
      dataset.columns.forEach((column, position) => {
        row[column] = cells[position] ?? null;
      });
      return row;
    });

    return { columns: dataset.columns, rows };
  }

  async save(name: string, table: Table): Promise<void> {
    const matrix = table.rows.map((row) => table.columns.map((column) => row[column] ?? null));

    await this.db.query(
      `
      INSERT INTO ${DATASET_TABLE} (name, columns, rows, row_count, updated_at)
      VALUES ($1, $2::text[], $3::jsonb, $4, NOW())
      ON CONFLICT (name)
      DO UPDATE SET
        columns = EXCLUDED.columns,
        rows = EXCLUDED.rows,
        row_count = EXCLUDED.row_count,
        updated_at = NOW()
      `,
      [name, [...table.columns], JSON.stringify(matrix), table.rows.length],
    );
  }
}
