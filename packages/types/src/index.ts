export * from "./contracts.js";
export * from "./models.js";
