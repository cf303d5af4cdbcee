/**
 * Turn loop: model call, tool calls in order, results back to the model, until a reply
 * without tool calls or the iteration cap.
 */
import {
	type AssistantMessage,
	EndpointError,
	EventStream,
	getText,
	getToolCalls,
	type Message,
	type ToolCall,
	type ToolResultMessage,
	validateToolArguments,
	withRetry,
} from "@finch/ai";
import { logger } from "@finch/utils";
import { needsConfirmation, renderCallPreview } from "./confirmation";
import { ConfirmationDeclinedError, ExecutionError, IterationCapExceededError } from "./errors";
import type { AgentContext, AgentEvent, AgentLoopConfig, AgentRunResult, AgentToolResult } from "./types";

const DEFAULT_RETRY = { maxRetries: 3, baseDelayMs: 1_000 };

/**
 * Start a run with new prompt messages. The prompts are added to the context and
 * emitted like any other message; the stream's result is the run outcome.
 */
export function agentLoop(
	prompts: Message[],
	context: AgentContext,
	config: AgentLoopConfig,
	signal?: AbortSignal,
): EventStream<AgentEvent, AgentRunResult> {
	const stream = createAgentStream();
	const newMessages: Message[] = [...prompts];
	const currentContext: AgentContext = {
		systemPrompt: context.systemPrompt,
		messages: [...context.messages, ...prompts],
	};

	stream.push({ type: "agent_start" });
	for (const prompt of prompts) {
		stream.push({ type: "message_start", message: prompt });
		stream.push({ type: "message_end", message: prompt });
	}

	void runLoop(currentContext, newMessages, config, signal, stream).then(
		result => {
			stream.push({ type: "agent_end", result });
			stream.end(result);
		},
		(err: unknown) => {
			// Only reachable through a bug in an event listener or the loop itself.
			logger.error("Agent loop crashed", { error: err instanceof Error ? err.message : String(err) });
			const result: AgentRunResult = { messages: newMessages, error: err instanceof Error ? err : new Error(String(err)) };
			stream.push({ type: "agent_end", result });
			stream.end(result);
		},
	);

	return stream;
}

function createAgentStream(): EventStream<AgentEvent, AgentRunResult> {
	return new EventStream<AgentEvent, AgentRunResult>(
		event => event.type === "agent_end",
		event => (event.type === "agent_end" ? event.result : { messages: [] }),
	);
}

async function runLoop(
	context: AgentContext,
	newMessages: Message[],
	config: AgentLoopConfig,
	signal: AbortSignal | undefined,
	stream: EventStream<AgentEvent, AgentRunResult>,
): Promise<AgentRunResult> {
	const append = (message: Message) => {
		context.messages.push(message);
		newMessages.push(message);
	};

	for (let iteration = 1; ; iteration++) {
		if (iteration > config.maxIterations) {
			const error = new IterationCapExceededError(config.maxIterations);
			logger.warn("Iteration cap reached", { maxIterations: config.maxIterations });
			return { messages: newMessages, error };
		}
		stream.push({ type: "turn_start", iteration });

		let message: AssistantMessage;
		try {
			message = await callModel(context, config, signal, stream);
		} catch (err) {
			const error =
				err instanceof EndpointError
					? err
					: new EndpointError(err instanceof Error ? err.message : String(err), { attempts: 1, cause: err });
			return { messages: newMessages, error };
		}
		stream.push({ type: "message_start", message });
		append(message);
		stream.push({ type: "message_end", message });

		const toolCalls = getToolCalls(message);
		if (toolCalls.length === 0) {
			stream.push({ type: "turn_end", message, toolResults: [] });
			return { messages: newMessages, finalText: getText(message) };
		}

		const toolResults = await executeToolCalls(toolCalls, config, signal, stream);
		for (const result of toolResults) {
			append(result);
		}
		stream.push({ type: "turn_end", message, toolResults });
	}
}

async function callModel(
	context: AgentContext,
	config: AgentLoopConfig,
	signal: AbortSignal | undefined,
	stream: EventStream<AgentEvent, AgentRunResult>,
): Promise<AssistantMessage> {
	const messages = config.transformContext ? config.transformContext(context.messages) : context.messages;
	const llmContext = {
		systemPrompt: context.systemPrompt,
		messages,
		tools: config.registry.schemas(),
	};
	const retry = config.retry ?? DEFAULT_RETRY;
	return withRetry(() => config.chat(config.model, llmContext, { signal }), {
		...retry,
		signal,
		label: `${config.model.provider}/${config.model.id}`,
		onRetry: (attempt, delayMs, err) => {
			stream.push({
				type: "model_retry",
				attempt,
				delayMs,
				reason: err instanceof Error ? err.message : String(err),
			});
		},
	});
}

/**
 * Execute tool calls strictly in order. Every call yields exactly one result,
 * whether it ran, failed validation, was declined or threw.
 */
async function executeToolCalls(
	toolCalls: ToolCall[],
	config: AgentLoopConfig,
	signal: AbortSignal | undefined,
	stream: EventStream<AgentEvent, AgentRunResult>,
): Promise<ToolResultMessage[]> {
	const results: ToolResultMessage[] = [];

	for (const toolCall of toolCalls) {
		stream.push({
			type: "tool_execution_start",
			toolCallId: toolCall.id,
			toolName: toolCall.name,
			args: toolCall.arguments,
		});

		const outcome = await runToolCall(toolCall, config, signal, stream);
		stream.push({
			type: "tool_execution_end",
			toolCallId: toolCall.id,
			toolName: toolCall.name,
			result: outcome.result,
			isError: outcome.error !== undefined,
			error: outcome.error,
		});

		const toolResultMessage: ToolResultMessage = {
			role: "toolResult",
			toolCallId: toolCall.id,
			toolName: toolCall.name,
			content: outcome.result.content,
			details: outcome.result.details,
			isError: outcome.error !== undefined,
			timestamp: Date.now(),
		};
		results.push(toolResultMessage);
		stream.push({ type: "message_start", message: toolResultMessage });
		stream.push({ type: "message_end", message: toolResultMessage });
	}

	return results;
}

interface ToolCallOutcome {
	result: AgentToolResult;
	error?: Error;
}

async function runToolCall(
	toolCall: ToolCall,
	config: AgentLoopConfig,
	signal: AbortSignal | undefined,
	stream: EventStream<AgentEvent, AgentRunResult>,
): Promise<ToolCallOutcome> {
	let stage = "lookup";
	try {
		const tool = config.registry.lookup(toolCall.name);
		stage = "validation";
		const args = validateToolArguments(tool, toolCall);

		if (needsConfirmation(tool, args)) {
			stage = "confirmation";
			const approved =
				(await config.confirmation?.confirm(
					{
						toolCallId: toolCall.id,
						toolName: tool.name,
						label: tool.label,
						args,
						preview: renderCallPreview(tool, args),
					},
					signal,
				)) ?? false;
			stream.push({ type: "tool_confirmation", toolCallId: toolCall.id, toolName: tool.name, approved });
			if (!approved) {
				return declinedOutcome(tool.name);
			}
		}

		stage = "execution";
		try {
			return { result: await tool.execute(toolCall.id, args, signal) };
		} catch (err) {
			throw new ExecutionError(tool.name, err);
		}
	} catch (err) {
		const error = err instanceof Error ? err : new Error(String(err));
		logger.debug("Tool call failed", { toolName: toolCall.name, stage, error: error.message });
		return {
			result: { content: [{ type: "text", text: error.message }], details: { error: error.name } },
			error,
		};
	}
}

function declinedOutcome(toolName: string): ToolCallOutcome {
	const error = new ConfirmationDeclinedError(toolName);
	return {
		result: {
			content: [{ type: "text", text: JSON.stringify({ status: "cancelled", message: error.message }) }],
			details: { status: "cancelled" },
		},
		error,
	};
}
