import type { Cell, Row, Table } from "@sampler/types";
import { SchemaMismatchError } from "./errors.js";

export interface MergeOptions {
  /** Column identifying a record. Defaults to "id". */
  readonly key?: string;
  /** Column the result is ordered by. Defaults to "subreddit_name". */
  readonly sort?: string;
}

export const DEFAULT_MERGE_KEY = "id";
export const DEFAULT_MERGE_SORT = "subreddit_name";

const sameColumnSet = (a: readonly string[], b: readonly string[]): boolean => {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((column) => right.has(column));
};

// Loaded tables may hold "123" where collected ones hold 123, so keys compare as text.
const keyOf = (value: Cell | undefined): string =>
  value === null || value === undefined ? "\u0000null" : String(value);

const rank = (value: Cell): number => {
  switch (typeof value) {
    case "boolean":
      return 0;
    case "number":
      return 1;
    default:
      return 2;
  }
};

/** Nulls last; numbers numerically; booleans false first; text by code unit. */
export function compareCells(a: Cell | undefined, b: Cell | undefined): number {
  const left = a ?? null;
  const right = b ?? null;

  if (left === null || right === null) {
    return left === right ? 0 : left === null ? 1 : -1;
  }
  if (typeof left !== typeof right) {
    return rank(left) - rank(right);
  }
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }

  const l = String(left);
  const r = String(right);
  return l < r ? -1 : l > r ? 1 : 0;
}

/**
 * Combines a stored table with newly collected rows. Rows are taken
 * old-then-new and the first row seen for each key wins, so stored rows are
 * never replaced. The result is sorted by `sort`, ties kept in that order.
 */
export function mergeTables(existing: Table, incoming: Table, options: MergeOptions = {}): Table {
  const key = options.key ?? DEFAULT_MERGE_KEY;
  const sort = options.sort ?? DEFAULT_MERGE_SORT;

  if (!sameColumnSet(existing.columns, incoming.columns)) {
    throw new SchemaMismatchError(
      "Both data sets must have the same features",
      existing.columns,
      incoming.columns,
    );
  }
  for (const column of [key, sort]) {
    if (!existing.columns.includes(column)) {
      throw new SchemaMismatchError(
        `Column '${column}' is not in the data set`,
        existing.columns,
        incoming.columns,
      );
    }
  }

  const seen = new Set<string>();
  const kept: Row[] = [];
  for (const row of [...existing.rows, ...incoming.rows]) {
    const id = keyOf(row[key]);
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    kept.push(row);
  }

  const ordered = kept
    .map((row, index) => ({ row, index }))
    .sort((a, b) => compareCells(a.row[sort], b.row[sort]) || a.index - b.index)
    .map(({ row }) => {
      const aligned: Record<string, Cell> = {};
      for (const column of existing.columns) {
        aligned[column] = row[column] ?? null;
      }
      return aligned;
    });

  return { columns: [...existing.columns], rows: ordered };
}
