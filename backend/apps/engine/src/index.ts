// engine/src/index.ts
export * from "./engine";
export * from "./config";
export * from "../../../libs/runtime/src";
export * from "../../../libs/store/src";
export * from "../../../libs/stats/src";
