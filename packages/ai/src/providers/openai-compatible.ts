/**
 * Chat client for OpenAI-compatible endpoints. Ollama serves this API under `<host>/v1`,
 * which is what finch talks to by default.
 */
import { isRecord, logger, tryParseJson } from "@finch/utils";
import OpenAI from "openai";
import type {
	ChatCompletion,
	ChatCompletionCreateParamsNonStreaming,
	ChatCompletionMessageParam,
	ChatCompletionMessageToolCall,
	ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { AssistantMessage, ChatFn, Context, Message, Model, StopReason, TextContent, Tool, ToolCall } from "../types";
import { getText } from "../types";
import { extractToolLines } from "../utils/tool-call-parser";

export interface ChatCompletionsClient {
	chat: {
		completions: {
			create(
				body: ChatCompletionCreateParamsNonStreaming,
				options?: { signal?: AbortSignal },
			): PromiseLike<ChatCompletion>;
		};
	};
}

export interface OpenAICompatibleOptions {
	apiKey?: string;
	/** Injected client; defaults to the `openai` SDK pointed at the model's base URL. */
	client?: ChatCompletionsClient;
	/** Request timeout for a single attempt. */
	timeoutMs?: number;
}

/** Normalise an Ollama host (`http://localhost:11434`) into its OpenAI-compatible base URL. */
export function toOpenAIBaseUrl(host: string): string {
	const trimmed = host.trim().replace(/\/+$/, "");
	return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

export function createOllamaModel(host: string, id: string): Model {
	return { id, provider: "ollama", baseUrl: toOpenAIBaseUrl(host) };
}

function createClient(model: Model, options: OpenAICompatibleOptions): ChatCompletionsClient {
	return new OpenAI({
		apiKey: options.apiKey || "ollama",
		baseURL: model.baseUrl,
		// Retries are owned by the agent loop so they are counted and logged once.
		maxRetries: 0,
		timeout: options.timeoutMs ?? 600_000,
	});
}

function convertMessages(context: Context): ChatCompletionMessageParam[] {
	const out: ChatCompletionMessageParam[] = [];
	if (context.systemPrompt) {
		out.push({ role: "system", content: context.systemPrompt });
	}
	for (const message of context.messages) {
		out.push(convertMessage(message));
	}
	return out;
}

function convertMessage(message: Message): ChatCompletionMessageParam {
	switch (message.role) {
		case "user":
			return { role: "user", content: message.content };
		case "assistant": {
			const calls = message.content.filter((block): block is ToolCall => block.type === "toolCall");
			const text = getText(message);
			if (calls.length === 0) {
				return { role: "assistant", content: text };
			}
			return {
				role: "assistant",
				content: text || null,
				tool_calls: calls.map((call): ChatCompletionMessageToolCall => ({
					id: call.id,
					type: "function",
					function: { name: call.name, arguments: JSON.stringify(call.arguments) },
				})),
			};
		}
		case "toolResult":
			return { role: "tool", tool_call_id: message.toolCallId, content: getText(message) };
	}
}

function convertTools(tools: Tool[]): ChatCompletionTool[] {
	return tools.map((tool): ChatCompletionTool => ({
		type: "function",
		function: {
			name: tool.name,
			description: tool.description,
			parameters: tool.parameters,
		},
	}));
}

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
	const parsed = tryParseJson(raw || "{}");
	if (isRecord(parsed)) return parsed;
	// Left empty so schema validation rejects the call and the model sees why.
	logger.warn("Tool call arguments are not a JSON object", { toolName, raw });
	return {};
}

let callCounter = 0;

function nextCallId(): string {
	callCounter++;
	return `call_${Date.now().toString(36)}_${callCounter}`;
}

/** Promote `tool: name({...})` lines in a plain reply into structured calls. */
function extractTextToolCalls(text: string): { calls: ToolCall[]; text: string } {
	const parsed = extractToolLines(text);
	if (parsed.length === 0) return { calls: [], text };
	const calls: ToolCall[] = [];
	for (const entry of parsed) {
		if (entry.kind === "error") {
			logger.warn("Ignoring malformed tool line", { line: entry.line, reason: entry.reason });
			continue;
		}
		calls.push({ type: "toolCall", id: nextCallId(), name: entry.name, arguments: entry.arguments });
	}
	if (calls.length === 0) return { calls, text };
	const remaining = text
		.split("\n")
		.filter(line => !line.trim().startsWith("tool:"))
		.join("\n")
		.trim();
	return { calls, text: remaining };
}

export function convertCompletion(model: Model, completion: ChatCompletion): AssistantMessage {
	const choice = completion.choices[0];
	if (!choice) {
		throw new Error("Endpoint returned no choices");
	}
	let text = choice.message.content ?? "";
	let calls = (choice.message.tool_calls ?? []).map((call): ToolCall => ({
		type: "toolCall",
		id: call.id || nextCallId(),
		name: call.function.name,
		arguments: parseArguments(call.function.arguments, call.function.name),
	}));
	if (calls.length === 0 && text.includes("tool:")) {
		const extracted = extractTextToolCalls(text);
		calls = extracted.calls;
		text = extracted.text;
	}

	const content: (TextContent | ToolCall)[] = [];
	if (text) content.push({ type: "text", text });
	content.push(...calls);

	let stopReason: StopReason = "stop";
	if (calls.length > 0) stopReason = "toolUse";
	else if (choice.finish_reason === "length") stopReason = "length";

	return { role: "assistant", content, model: model.id, stopReason, timestamp: Date.now() };
}

/**
 * Build a ChatFn for an OpenAI-compatible endpoint.
 * Transport errors propagate unchanged; the caller decides whether to retry.
 */
export function createOpenAICompatibleChat(options: OpenAICompatibleOptions = {}): ChatFn {
	const clients = new Map<string, ChatCompletionsClient>();
	const clientFor = (model: Model): ChatCompletionsClient => {
		if (options.client) return options.client;
		let client = clients.get(model.baseUrl);
		if (!client) {
			client = createClient(model, options);
			clients.set(model.baseUrl, client);
		}
		return client;
	};

	return async (model, context, chatOptions) => {
		const body: ChatCompletionCreateParamsNonStreaming = {
			model: model.id,
			messages: convertMessages(context),
			stream: false,
		};
		if (context.tools && context.tools.length > 0) {
			body.tools = convertTools(context.tools);
		}
		const completion = await clientFor(model).chat.completions.create(body, { signal: chatOptions?.signal });
		return convertCompletion(model, completion);
	};
}

/**
 * Check that the endpoint answers and knows the model.
 * @returns the model ids the endpoint lists
 */
export async function listEndpointModels(host: string, apiKey = "ollama"): Promise<string[]> {
	const client = new OpenAI({ apiKey, baseURL: toOpenAIBaseUrl(host), maxRetries: 0, timeout: 5_000 });
	const ids: string[] = [];
	for await (const entry of client.models.list()) {
		ids.push(entry.id);
	}
	return ids;
}
