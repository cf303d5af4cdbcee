// Wiring
export * from "./sdk";
// Settings and prompts
export * from "./config/prompt-templates";
export * from "./config/settings";
// Sessions
export * from "./session/agent-session";
export * from "./session/messages";
export * from "./session/session-store";
export * from "./session/truncation";
// Shell sessions
export * from "./shell/shell-manager";
export * from "./shell/shell-session";
// Plans
export * from "./plan-mode/plan-selection";
export * from "./plan-mode/types";
// Multi-agent
export * from "./multi-agent/agent-result";
export * from "./multi-agent/agents";
export * from "./multi-agent/coordinator";
export * from "./multi-agent/parallel";
export * from "./multi-agent/types";
// Tools
export * from "./exec/bash-executor";
export * from "./tools";
// Terminal UI
export * from "./modes/confirmation";
export * from "./modes/console-prompter";
export * from "./modes/event-renderer";
export * from "./modes/interactive-mode";
export type { Prompter } from "./modes/types";
