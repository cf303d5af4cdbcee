import { agentLoop } from "@finch/agent/agent-loop";
import { approveAll, type ConfirmationGate, type ConfirmationRequest, declineAll } from "@finch/agent/confirmation";
import { ConfirmationDeclinedError, IterationCapExceededError, ToolNotFoundError } from "@finch/agent/errors";
import { ToolRegistry } from "@finch/agent/tool-registry";
import type { AgentEvent, AgentLoopConfig, AgentTool } from "@finch/agent/types";
import type { AssistantMessage, ChatFn, Context, Model, ToolCall, UserMessage } from "@finch/ai";
import { EndpointError } from "@finch/ai";
import { type Static, Type } from "@sinclair/typebox";
import { describe, expect, it, vi } from "vitest";

const model: Model = { id: "mock", provider: "test", baseUrl: "http://localhost:11434/v1" };

function createAssistantMessage(content: AssistantMessage["content"]): AssistantMessage {
	const hasCalls = content.some(block => block.type === "toolCall");
	return { role: "assistant", content, model: "mock", stopReason: hasCalls ? "toolUse" : "stop", timestamp: Date.now() };
}

function createUserMessage(text: string): UserMessage {
	return { role: "user", content: text, timestamp: Date.now() };
}

function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
	return { type: "toolCall", id, name, arguments: args };
}

/** Chat function that replays the given replies in order and records each request. */
function scriptedChat(replies: AssistantMessage[]): ChatFn & { requests: Context[] } {
	const requests: Context[] = [];
	let index = 0;
	const chat = async (_model: Model, context: Context) => {
		requests.push({ ...context, messages: [...context.messages] });
		const reply = replies[index++];
		if (!reply) throw new Error("no scripted reply left");
		return reply;
	};
	return Object.assign(chat, { requests });
}

const echoSchema = Type.Object({ value: Type.String() });

function createEchoTool(dangerous = false): AgentTool<typeof echoSchema, { value: string }> {
	return {
		name: "echo",
		label: "Echo",
		description: "Echo a value",
		parameters: echoSchema,
		dangerous,
		execute: async (_id: string, params: Static<typeof echoSchema>) => ({
			content: [{ type: "text", text: `echoed: ${params.value}` }],
			details: { value: params.value },
		}),
	};
}

function createConfig(chat: ChatFn, tools: AgentTool[], overrides: Partial<AgentLoopConfig> = {}): AgentLoopConfig {
	return {
		model,
		chat,
		registry: new ToolRegistry(tools).freeze(),
		maxIterations: 10,
		retry: { maxRetries: 2, baseDelayMs: 1 },
		...overrides,
	};
}

async function collect(stream: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
	const events: AgentEvent[] = [];
	for await (const event of stream) events.push(event);
	return events;
}

describe("agentLoop", () => {
	it("returns the text of a reply without tool calls", async () => {
		const chat = scriptedChat([createAssistantMessage([{ type: "text", text: "Hi there!" }])]);
		const stream = agentLoop([createUserMessage("Hello")], { systemPrompt: "sys", messages: [] }, createConfig(chat, []));
		const events = await collect(stream);
		const result = await stream.result();

		expect(result.finalText).toBe("Hi there!");
		expect(result.error).toBeUndefined();
		expect(result.messages.map(m => m.role)).toEqual(["user", "assistant"]);
		expect(events.map(e => e.type)).toEqual([
			"agent_start",
			"message_start",
			"message_end",
			"turn_start",
			"message_start",
			"message_end",
			"turn_end",
			"agent_end",
		]);
		expect(chat.requests[0]?.systemPrompt).toBe("sys");
	});

	it("answers every tool call with exactly one result before the next model call", async () => {
		const chat = scriptedChat([
			createAssistantMessage([
				toolCall("c1", "echo", { value: "a" }),
				toolCall("c2", "missing_tool"),
				toolCall("c3", "echo", { value: 42 }),
			]),
			createAssistantMessage([{ type: "text", text: "done" }]),
		]);
		const stream = agentLoop([createUserMessage("go")], { systemPrompt: "", messages: [] }, createConfig(chat, [createEchoTool()]));
		const events = await collect(stream);
		const result = await stream.result();

		const second = chat.requests[1];
		expect(second?.messages.map(m => (m.role === "toolResult" ? m.toolCallId : m.role))).toEqual([
			"user",
			"assistant",
			"c1",
			"c2",
			"c3",
		]);
		const toolResults = result.messages.filter(m => m.role === "toolResult");
		expect(toolResults).toHaveLength(3);
		expect(toolResults.map(m => m.isError)).toEqual([false, true, true]);
		expect(toolResults[1]?.content[0]?.text).toBe("Unknown tool: missing_tool");

		const ends = events.filter(e => e.type === "tool_execution_end");
		expect(ends).toHaveLength(3);
		const missing = ends[1];
		expect(missing?.type === "tool_execution_end" && missing.error).toBeInstanceOf(ToolNotFoundError);
	});

	it("does not execute a call whose arguments fail validation", async () => {
		const tool = createEchoTool();
		const execute = vi.spyOn(tool, "execute");
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "echo", {})]),
			createAssistantMessage([{ type: "text", text: "ok" }]),
		]);
		const stream = agentLoop([createUserMessage("go")], { systemPrompt: "", messages: [] }, createConfig(chat, [tool]));
		const result = await stream.result();

		expect(execute).not.toHaveBeenCalled();
		const toolResult = result.messages.find(m => m.role === "toolResult");
		expect(toolResult?.isError).toBe(true);
		expect(toolResult?.content[0]?.text).toContain("value: must have required property 'value'");
	});

	it("feeds a throwing handler back as a failed result and keeps the turn going", async () => {
		const failing: AgentTool = {
			name: "fail",
			label: "Fail",
			description: "Always throws",
			parameters: Type.Object({}),
			execute: async () => {
				throw new Error("disk full");
			},
		};
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "fail")]),
			createAssistantMessage([{ type: "text", text: "recovered" }]),
		]);
		const stream = agentLoop([createUserMessage("go")], { systemPrompt: "", messages: [] }, createConfig(chat, [failing]));
		const result = await stream.result();

		expect(result.finalText).toBe("recovered");
		const toolResult = result.messages.find(m => m.role === "toolResult");
		expect(toolResult).toMatchObject({ isError: true, content: [{ type: "text", text: "disk full" }] });
	});

	it("asks for confirmation on every dangerous call, never caching the answer", async () => {
		const requests: ConfirmationRequest[] = [];
		const gate: ConfirmationGate = {
			confirm: async request => {
				requests.push(request);
				return true;
			},
		};
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "echo", { value: "one" }), toolCall("c2", "echo", { value: "two" })]),
			createAssistantMessage([{ type: "text", text: "done" }]),
		]);
		const stream = agentLoop(
			[createUserMessage("go")],
			{ systemPrompt: "", messages: [] },
			createConfig(chat, [createEchoTool(true)], { confirmation: gate }),
		);
		const result = await stream.result();

		expect(requests.map(r => r.toolCallId)).toEqual(["c1", "c2"]);
		expect(requests[0]?.preview).toBe('{\n  "value": "one"\n}');
		expect(result.messages.filter(m => m.role === "toolResult").every(m => !m.isError)).toBe(true);
	});

	it("skips only the declined call", async () => {
		const tool = createEchoTool(true);
		const execute = vi.spyOn(tool, "execute");
		let answer = false;
		const gate: ConfirmationGate = {
			confirm: async () => {
				const current = answer;
				answer = !answer;
				return current;
			},
		};
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "echo", { value: "no" }), toolCall("c2", "echo", { value: "yes" })]),
			createAssistantMessage([{ type: "text", text: "done" }]),
		]);
		const stream = agentLoop(
			[createUserMessage("go")],
			{ systemPrompt: "", messages: [] },
			createConfig(chat, [tool], { confirmation: gate }),
		);
		const events = await collect(stream);
		const result = await stream.result();

		expect(execute).toHaveBeenCalledTimes(1);
		const toolResults = result.messages.filter(m => m.role === "toolResult");
		expect(toolResults[0]?.content[0]?.text).toBe('{"status":"cancelled","message":"User cancelled execution"}');
		expect(toolResults[1]?.content[0]?.text).toBe("echoed: yes");
		const declined = events.find(e => e.type === "tool_execution_end" && e.toolCallId === "c1");
		expect(declined?.type === "tool_execution_end" && declined.error).toBeInstanceOf(ConfirmationDeclinedError);
		expect(result.finalText).toBe("done");
	});

	it("declines dangerous calls when no gate is configured", async () => {
		const tool = createEchoTool(true);
		const execute = vi.spyOn(tool, "execute");
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "echo", { value: "x" })]),
			createAssistantMessage([{ type: "text", text: "done" }]),
		]);
		await agentLoop([createUserMessage("go")], { systemPrompt: "", messages: [] }, createConfig(chat, [tool])).result();
		expect(execute).not.toHaveBeenCalled();
	});

	it("asks only for the calls the per-call policy flags", async () => {
		const tool: AgentTool<typeof echoSchema> = {
			...createEchoTool(false),
			requiresConfirmation: args => args.value.startsWith("rm"),
		};
		const confirm = vi.fn(declineAll.confirm);
		const chat = scriptedChat([
			createAssistantMessage([toolCall("c1", "echo", { value: "ls" }), toolCall("c2", "echo", { value: "rm -rf" })]),
			createAssistantMessage([{ type: "text", text: "done" }]),
		]);
		const result = await agentLoop(
			[createUserMessage("go")],
			{ systemPrompt: "", messages: [] },
			createConfig(chat, [tool], { confirmation: { confirm } }),
		).result();
		expect(confirm).toHaveBeenCalledTimes(1);
		expect(result.messages.filter(m => m.role === "toolResult").map(m => m.isError)).toEqual([false, true]);
	});

	it("stops a self-retriggering tool at the iteration cap", async () => {
		let n = 0;
		const chat: ChatFn = async () => createAssistantMessage([toolCall(`c${++n}`, "echo", { value: "again" })]);
		const stream = agentLoop(
			[createUserMessage("loop")],
			{ systemPrompt: "", messages: [] },
			createConfig(chat, [createEchoTool()], { maxIterations: 3, confirmation: approveAll }),
		);
		const result = await stream.result();

		expect(n).toBe(3);
		expect(result.error).toBeInstanceOf(IterationCapExceededError);
		expect(result.error?.message).toBe("Stopped after 3 model calls without a final answer");
		const calls = result.messages.filter(m => m.role === "assistant").length;
		const results = result.messages.filter(m => m.role === "toolResult").length;
		expect(calls).toBe(3);
		expect(results).toBe(3);
	});

	it("retries the endpoint and then ends the turn with EndpointError", async () => {
		const chat = vi.fn<ChatFn>().mockRejectedValue(new Error("fetch failed"));
		const stream = agentLoop([createUserMessage("hi")], { systemPrompt: "", messages: [] }, createConfig(chat, []));
		const events = await collect(stream);
		const result = await stream.result();

		expect(chat).toHaveBeenCalledTimes(3);
		expect(events.filter(e => e.type === "model_retry")).toHaveLength(2);
		expect(result.error).toBeInstanceOf(EndpointError);
		expect(result.messages.map(m => m.role)).toEqual(["user"]);
	});

	it("applies transformContext before each model call", async () => {
		const chat = scriptedChat([createAssistantMessage([{ type: "text", text: "ok" }])]);
		const history = [createUserMessage("old 1"), createUserMessage("old 2")];
		await agentLoop([createUserMessage("new")], { systemPrompt: "", messages: history }, createConfig(chat, [], {
			transformContext: messages => messages.slice(-1),
		})).result();
		expect(chat.requests[0]?.messages).toHaveLength(1);
	});
});
