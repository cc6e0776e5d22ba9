export * from "./comment-collector.js";
export * from "./comment-tree.js";
export * from "./data-collector.js";
export * from "./dataset.js";
export * from "./errors.js";
export * from "./filters.js";
export * from "./logger.js";
export * from "./merge.js";
export * from "./post-collector.js";
export * from "./progress.js";
export * from "./records.js";
export * from "./reddit-client.js";
export * from "./retry.js";
export * from "./tabular.js";
export * from "./verifier.js";
