import type { ChatFn, Message, Model, TextContent, Tool, ToolResultMessage } from "@finch/ai";
import type { Static, TSchema } from "@sinclair/typebox";
import type { ConfirmationGate } from "./confirmation";
import type { ToolRegistry } from "./tool-registry";

export interface AgentToolResult<TDetails = unknown> {
	content: TextContent[];
	/** Structured data for the UI and for callers that inspect results (never sent to the model). */
	details?: TDetails;
}

/**
 * A callable capability. Registry metadata (name, schema, description) is what the
 * model sees; `execute` only ever receives arguments that passed schema validation.
 */
export interface AgentTool<TParameters extends TSchema = TSchema, TDetails = unknown> extends Tool<TParameters> {
	/** Human-readable name for the UI. */
	label: string;
	/** Calls need explicit per-call user approval. */
	dangerous?: boolean;
	/** Per-call check for tools that are not `dangerous`, e.g. only write queries of a database tool. */
	requiresConfirmation?(args: Static<TParameters>): boolean;
	/** Text shown at the confirmation prompt; defaults to the JSON arguments. */
	describeCall?(args: Static<TParameters>): string;
	execute(toolCallId: string, params: Static<TParameters>, signal?: AbortSignal): Promise<AgentToolResult<TDetails>>;
}

export interface RetrySettings {
	maxRetries: number;
	baseDelayMs: number;
}

export interface AgentLoopConfig {
	model: Model;
	chat: ChatFn;
	/** Tools bound to this loop instance; read-only while the loop runs. */
	registry: ToolRegistry;
	/** Gate for dangerous calls. Without one every dangerous call is declined. */
	confirmation?: ConfirmationGate;
	/** Model calls allowed per turn. */
	maxIterations: number;
	retry?: RetrySettings;
	/** Applied to the history right before each model call (e.g. truncation). */
	transformContext?: (messages: Message[]) => Message[];
}

export interface AgentContext {
	systemPrompt: string;
	messages: Message[];
}

export interface AgentRunResult {
	/** Messages produced during this run, prompts included. */
	messages: Message[];
	/** Text of the closing tool-free assistant reply, when the run reached one. */
	finalText?: string;
	/** EndpointError or IterationCapExceededError that ended the run early. */
	error?: Error;
}

export type AgentEvent =
	| { type: "agent_start" }
	| { type: "agent_end"; result: AgentRunResult }
	// A turn is one model call plus the tool calls it asked for.
	| { type: "turn_start"; iteration: number }
	| { type: "turn_end"; message: Message; toolResults: ToolResultMessage[] }
	| { type: "message_start"; message: Message }
	| { type: "message_end"; message: Message }
	| { type: "model_retry"; attempt: number; delayMs: number; reason: string }
	| { type: "tool_execution_start"; toolCallId: string; toolName: string; args: Record<string, unknown> }
	| { type: "tool_confirmation"; toolCallId: string; toolName: string; approved: boolean }
	| {
			type: "tool_execution_end";
			toolCallId: string;
			toolName: string;
			result: AgentToolResult;
			isError: boolean;
			error?: Error;
	  };
