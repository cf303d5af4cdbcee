export * from "./async";
export * from "./dirs";
export * from "./env";
export * from "./json";
export * as logger from "./logger";
export * from "./type-guards";
