import type { Table, TableStore } from "@sampler/types";
import { silentLogger, type Logger } from "./logger.js";
import { mergeTables, type MergeOptions } from "./merge.js";

export interface UpdateDatasetOptions extends MergeOptions {
  /** Write the combined table back to the store. Defaults to true. */
  readonly persist?: boolean;
  readonly logger?: Logger;
}

/**
 * Merges `incoming` into the table stored at `location` and returns the
 * result. Nothing is written unless the merge succeeds and `persist` is set.
 * A location with nothing stored yet counts as an empty history.
 */
export async function updateDataset(
  store: TableStore,
  location: string,
  incoming: Table,
  options: UpdateDatasetOptions = {},
): Promise<Table> {
  const logger = options.logger ?? silentLogger;
  const stored = await store.load(location);
  const existing: Table = stored ?? { columns: incoming.columns, rows: [] };

  if (!stored) {
    logger.info({ location }, "dataset_created");
  }

  const combined = mergeTables(existing, incoming, options);

  if (options.persist ?? true) {
    await store.save(location, combined);
  }

  logger.info(
    {
      location,
      existingRows: existing.rows.length,
      incomingRows: incoming.rows.length,
      combinedRows: combined.rows.length,
      persisted: options.persist ?? true,
    },
    "dataset_merged",
  );
  return combined;
}
