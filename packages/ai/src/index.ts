export * from "./errors";
export * from "./providers/openai-compatible";
export * from "./types";
export * from "./utils/event-stream";
export * from "./utils/retry";
export * from "./utils/tool-call-parser";
export * from "./utils/typebox-helpers";
export * from "./utils/validation";
