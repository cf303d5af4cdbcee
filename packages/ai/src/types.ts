import type { TSchema } from "@sinclair/typebox";

export interface TextContent {
	type: "text";
	text: string;
}

export interface ToolCall {
	type: "toolCall";
	/** Correlation id; every call is answered by exactly one ToolResultMessage with the same id. */
	id: string;
	name: string;
	arguments: Record<string, unknown>;
}

export interface UserMessage {
	role: "user";
	content: string;
	timestamp: number;
	/** Leading project-context message that history truncation never drops. */
	pinned?: boolean;
}

export type StopReason = "stop" | "toolUse" | "length" | "error";

export interface AssistantMessage {
	role: "assistant";
	content: (TextContent | ToolCall)[];
	model: string;
	stopReason: StopReason;
	errorMessage?: string;
	timestamp: number;
}

export interface ToolResultMessage<TDetails = unknown> {
	role: "toolResult";
	toolCallId: string;
	toolName: string;
	content: TextContent[];
	details?: TDetails;
	isError: boolean;
	timestamp: number;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

export interface Tool<TParameters extends TSchema = TSchema> {
	name: string;
	description: string;
	parameters: TParameters;
}

export interface Model {
	id: string;
	provider: string;
	baseUrl: string;
}

export interface Context {
	systemPrompt: string;
	messages: Message[];
	tools?: Tool[];
}

export interface ChatOptions {
	signal?: AbortSignal;
}

/**
 * Model endpoint: one request with the full history and tool set, one complete assistant reply.
 * Tool calls in the reply keep the order the endpoint produced them in.
 */
export type ChatFn = (model: Model, context: Context, options?: ChatOptions) => Promise<AssistantMessage>;

export function getToolCalls(message: AssistantMessage): ToolCall[] {
	return message.content.filter((block): block is ToolCall => block.type === "toolCall");
}

export function getText(message: AssistantMessage | ToolResultMessage): string {
	const content: (TextContent | ToolCall)[] = message.content;
	return content
		.filter((block): block is TextContent => block.type === "text")
		.map(block => block.text)
		.join("");
}
