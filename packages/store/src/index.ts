export * from "./client.js";
export * from "./csv-table-store.js";
export * from "./postgres-table-store.js";
export * from "./schema.js";
