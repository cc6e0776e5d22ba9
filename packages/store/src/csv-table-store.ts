import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Cell, ColumnType, ColumnTypes, Row, Table, TableStore } from "@sampler/types";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

const recordsSchema = z.array(z.array(z.string()));

export interface CsvTableStoreOptions {
  /**
   * Cell types by column. Cells of listed columns are converted on load;
   * anything else stays text. Cells that do not convert stay text too.
   */
  readonly columnTypes?: ColumnTypes;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export function parseCell(raw: string, type: ColumnType | undefined): Cell {
  if (raw === "") {
    return null;
  }

  switch (type) {
    case "number": {
      const value = Number(raw);
      return raw.trim() !== "" && Number.isFinite(value) ? value : raw;
    }
    case "boolean": {
      const lowered = raw.toLowerCase();
      return lowered === "true" ? true : lowered === "false" ? false : raw;
    }
    default:
      return raw;
  }
}

export function formatCell(value: Cell | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value);
}

/**
 * CSV files with a header row. Empty cells read back as null. Saving writes
 * a temporary file beside the destination and renames it into place.
 */
export class CsvTableStore implements TableStore {
  private readonly columnTypes: ColumnTypes;

  constructor(options: CsvTableStoreOptions = {}) {
    this.columnTypes = options.columnTypes ?? {};
  }

  async load(filePath: string): Promise<Table | undefined> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed: unknown = parse(text, { bom: true, skip_empty_lines: true });
    const [header, ...records] = recordsSchema.parse(parsed);
    if (!header) {
      throw new Error(`CSV file has no header row: ${filePath}`);
    }

    const rows: Row[] = records.map((record) => {
      const row: Record<string, Cell> = {};
      header.forEach((column, index) => {
        row[column] = parseCell(record[index] ?? "", this.columnTypes[column]);
      });
      return row;
    });

    return { columns: header, rows };
  }

  async save(filePath: string, table: Table): Promise<void> {
    const dir = path.dirname(filePath);
    await mkdir(dir, { recursive: true });

    const records = [
      [...table.columns],
      ...table.rows.map((row) => table.columns.map((column) => formatCell(row[column]))),
    ];
    const csv = stringify(records);

    const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
    try {
      await writeFile(tempPath, csv, "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
