export * from "./agent";
export * from "./agent-loop";
export * from "./confirmation";
export * from "./errors";
export * from "./tool-registry";
export * from "./types";
