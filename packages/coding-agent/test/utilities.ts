/**
 * Shared test utilities for coding-agent tests.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { AssistantMessage, ChatFn, Context, Model, ToolCall, ToolResultMessage, UserMessage } from "@finch/ai";
import { Settings } from "@finch/coding-agent/config/settings";
import type { Prompter } from "@finch/coding-agent/modes/types";
import { ShellSessionManager } from "@finch/coding-agent/shell/shell-manager";
import type { ToolSession } from "@finch/coding-agent/tools";

export const testModel: Model = { id: "test-model", provider: "ollama", baseUrl: "http://localhost:11434/v1" };

/**
 * Create a minimal user message for testing.
 */
export function userMsg(text: string, timestamp = Date.now()): UserMessage {
	return { role: "user", content: text, timestamp };
}

/**
 * Create a minimal assistant message for testing.
 */
export function assistantMsg(text: string, timestamp = Date.now()): AssistantMessage {
	return { role: "assistant", content: [{ type: "text", text }], model: "test-model", stopReason: "stop", timestamp };
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
	return { type: "toolCall", id, name, arguments: args };
}

/** Assistant message that asks for the given tool calls. */
export function toolCallMsg(calls: ToolCall[], text = ""): AssistantMessage {
	const content: AssistantMessage["content"] = text ? [{ type: "text", text }, ...calls] : [...calls];
	return { role: "assistant", content, model: "test-model", stopReason: "toolUse", timestamp: Date.now() };
}

export function toolResultMsg(call: ToolCall, text: string, isError = false, details?: unknown): ToolResultMessage {
	return {
		role: "toolResult",
		toolCallId: call.id,
		toolName: call.name,
		content: [{ type: "text", text }],
		details,
		isError,
		timestamp: Date.now(),
	};
}

/** Chat function that replays the given replies in order and records each request. */
export function scriptedChat(replies: AssistantMessage[]): ChatFn & { requests: Context[] } {
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

/** Prompter that answers from a list (`undefined` = EOF) and records everything printed and asked. */
export class ScriptedPrompter implements Prompter {
	readonly printed: string[] = [];
	readonly questions: string[] = [];
	readonly #answers: (string | undefined)[];

	constructor(answers: (string | undefined)[]) {
		this.#answers = [...answers];
	}

	async ask(question: string): Promise<string | undefined> {
		this.questions.push(question);
		return this.#answers.shift();
	}

	print(text: string): void {
		this.printed.push(text);
	}

	get remaining(): number {
		return this.#answers.length;
	}
}

export function createTempDir(prefix = "finch-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Tool session rooted at `cwd` with in-memory settings.
 * Call `session.shells.dispose()` when done.
 */
export function createTestToolSession(cwd: string, overrides: Partial<ToolSession> = {}): ToolSession {
	return {
		cwd,
		settings: Settings.isolated({ "tools.commandTimeoutSeconds": 10, "shell.defaultTimeoutSeconds": 10 }),
		shells: new ShellSessionManager({ cwd, idleTimeoutMs: 60_000, defaultTimeoutMs: 10_000 }),
		...overrides,
	};
}
