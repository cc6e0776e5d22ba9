import type { Cell, CollectionResult, Row, Table } from "@sampler/types";

type RecordOf<K extends string> = { readonly [P in K]: Cell };

/**
 * Builds a table with exactly `columns`, in that order, from records sharing
 * one schema. Records keep their order.
 */
export function toTable<K extends string>(
  columns: readonly K[],
  records: readonly RecordOf<K>[],
): Table {
  const rows: Row[] = records.map((record) => {
    const row: Record<string, Cell> = {};
    for (const column of columns) {
      row[column] = record[column];
    }
    return row;
  });

  return { columns: [...columns], rows };
}

/** One table per subreddit, keyed and ordered like the collection result. */
export function toSeparateTables<K extends string>(
  columns: readonly K[],
  result: CollectionResult<RecordOf<K>>,
): Map<string, Table> {
  const tables = new Map<string, Table>();
  for (const [subreddit, records] of result) {
    tables.set(subreddit, toTable(columns, records));
  }
  return tables;
}

/**
 * All subreddits in one table: subreddit blocks in result order, rows within
 * a block in collection order. `subreddit_name` tells the blocks apart.
 */
export function toCombinedTable<K extends string>(
  columns: readonly K[],
  result: CollectionResult<RecordOf<K>>,
): Table {
  const records: RecordOf<K>[] = [];
  for (const subredditRecords of result.values()) {
    records.push(...subredditRecords);
  }
  return toTable(columns, records);
}
