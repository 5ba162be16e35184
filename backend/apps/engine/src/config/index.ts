// config/index.ts
export * from "./schema";
export * from "./defaults";
export * from "./env";
