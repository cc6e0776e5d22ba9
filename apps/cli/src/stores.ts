import { CsvTableStore, DatabaseClient, PostgresTableStore } from "@sampler/store";
import {
  COMMENT_COLUMN_TYPES,
  POST_COLUMN_TYPES,
  type TableStore,
} from "@sampler/types";
import type { AppConfig } from "./config.js";

export type DatasetKind = "posts" | "comments";

export interface DatasetStores {
  readonly posts: TableStore;
  readonly comments: TableStore;
  close(): Promise<void>;
}

export const columnTypesFor = (kind: DatasetKind) =>
  kind === "posts" ? POST_COLUMN_TYPES : COMMENT_COLUMN_TYPES;

/**
 * CSV stores address datasets by file path; the Postgres store by dataset
 * name. Both dataset kinds share one pool.
 */
export async function openStores(config: AppConfig): Promise<DatasetStores> {
  if (config.DATASET_STORE === "csv") {
    return {
      posts: new CsvTableStore({ columnTypes: columnTypesFor("posts") }),
      comments: new CsvTableStore({ columnTypes: columnTypesFor("comments") }),
      close: async () => {},
    };
  }

  const dbClient = new DatabaseClient({ databaseUrl: config.DATABASE_URL });
  const store = new PostgresTableStore(dbClient);
  try {
    await store.ensureSchema();
  } catch (error) {
    await dbClient.close();
    throw error;
  }

  return {
    posts: store,
    comments: store,
    close: () => dbClient.close(),
  };
}

export async function withStores<T>(
  config: AppConfig,
  fn: (stores: DatasetStores) => Promise<T>,
): Promise<T> {
  const stores = await openStores(config);
  try {
    return await fn(stores);
  } finally {
    await stores.close();
  }
}
