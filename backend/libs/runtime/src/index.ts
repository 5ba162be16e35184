// runtime/src/index.ts
export * from "./errors";
export * from "./outcome";
export * from "./logger";
export * from "./mutex";
export * from "./retry";
export * from "./tracing";
