import type { ChatFn, Message, Model, UserMessage } from "@finch/ai";
import { agentLoop } from "./agent-loop";
import type { ConfirmationGate } from "./confirmation";
import { AgentBusyError } from "./errors";
import { ToolRegistry } from "./tool-registry";
import type { AgentEvent, AgentLoopConfig, AgentRunResult, RetrySettings } from "./types";

export interface AgentState {
	systemPrompt: string;
	model: Model;
	registry: ToolRegistry;
	messages: Message[];
	isRunning: boolean;
	/** Reason the last run ended early, if it did. */
	error?: string;
}

export interface AgentOptions {
	model: Model;
	chat: ChatFn;
	systemPrompt?: string;
	registry?: ToolRegistry;
	messages?: Message[];
	confirmation?: ConfirmationGate;
	/** Model calls allowed per user turn. */
	maxIterations?: number;
	retry?: RetrySettings;
	transformContext?: (messages: Message[]) => Message[];
}

const DEFAULT_MAX_ITERATIONS = 25;

/**
 * Stateful wrapper around `agentLoop`: owns the conversation history and runs
 * one user turn at a time.
 */
export class Agent {
	#state: AgentState;
	#listeners = new Set<(e: AgentEvent) => void>();
	#abortController?: AbortController;
	readonly #chat: ChatFn;
	readonly #confirmation?: ConfirmationGate;
	readonly #maxIterations: number;
	readonly #retry?: RetrySettings;
	readonly #transformContext?: (messages: Message[]) => Message[];

	constructor(opts: AgentOptions) {
		this.#state = {
			systemPrompt: opts.systemPrompt ?? "",
			model: opts.model,
			registry: opts.registry ?? new ToolRegistry().freeze(),
			messages: opts.messages ? [...opts.messages] : [],
			isRunning: false,
		};
		this.#chat = opts.chat;
		this.#confirmation = opts.confirmation;
		this.#maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
		this.#retry = opts.retry;
		this.#transformContext = opts.transformContext;
	}

	get state(): Readonly<AgentState> {
		return this.#state;
	}

	subscribe(fn: (e: AgentEvent) => void): () => void {
		this.#listeners.add(fn);
		return () => this.#listeners.delete(fn);
	}

	appendMessage(m: Message): void {
		this.#state.messages = [...this.#state.messages, m];
	}

	abort(): void {
		this.#abortController?.abort();
	}

	/**
	 * Run one user turn to completion.
	 * Endpoint failures and the iteration cap end the turn and are reported in the
	 * result; history up to that point is kept.
	 * @throws AgentBusyError while another turn is running
	 */
	async prompt(input: string | UserMessage): Promise<AgentRunResult> {
		if (this.#state.isRunning) {
			throw new AgentBusyError();
		}
		const message: UserMessage =
			typeof input === "string" ? { role: "user", content: input, timestamp: Date.now() } : input;
		return this.#run(message);
	}

	async #run(prompt: UserMessage): Promise<AgentRunResult> {
		this.#abortController = new AbortController();
		this.#state.isRunning = true;
		this.#state.error = undefined;

		const config: AgentLoopConfig = {
			model: this.#state.model,
			chat: this.#chat,
			registry: this.#state.registry,
			confirmation: this.#confirmation,
			maxIterations: this.#maxIterations,
			retry: this.#retry,
			transformContext: this.#transformContext,
		};

		try {
			const stream = agentLoop(
				[prompt],
				{ systemPrompt: this.#state.systemPrompt, messages: this.#state.messages.slice() },
				config,
				this.#abortController.signal,
			);
			for await (const event of stream) {
				if (event.type === "message_end") {
					this.appendMessage(event.message);
				}
				if (event.type === "agent_end" && event.result.error) {
					this.#state.error = event.result.error.message;
				}
				this.#emit(event);
			}
			return await stream.result();
		} finally {
			this.#state.isRunning = false;
			this.#abortController = undefined;
		}
	}

	#emit(e: AgentEvent): void {
		for (const listener of this.#listeners) {
			listener(e);
		}
	}
}
