// store/src/index.ts
export * from "./driver";
export * from "./sql";
export * from "./values";
export * from "./store";
export * from "./registry";
export * from "./schema";
export * from "./ingest";
export * from "./preview";
