// stats/src/index.ts
export * from "./types";
export * from "./severity";
export * from "./distribution";
export * from "./bias";
export * from "./psi";
export * from "./drift";
export * from "./fairness";
export * from "./correlation";
