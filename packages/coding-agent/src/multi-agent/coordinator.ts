/**
 * Multi-agent coordination.
 *
 * The orchestrator is an ordinary Agent whose registry holds propose_plan and
 * delegate_task. Each delegation starts a fresh agent loop for one specialist, seeded
 * with only the task and its context, runs it to completion and hands back an
 * AgentResult. Specialists never hold delegate_task, so delegation is one level deep.
 */
import {
	Agent,
	type AgentEvent,
	type ConfirmationGate,
	type RetrySettings,
	type ToolRegistry,
	ToolNotAllowedError,
	agentLoop,
} from "@finch/agent";
import { type ChatFn, type Message, type Model, type UserMessage, ValidationError } from "@finch/ai";
import { formatJson, logger } from "@finch/utils";
import { renderPrompt } from "../config/prompt-templates";
import { truncateMessages } from "../session/truncation";
import { buildAgentResult } from "./agent-result";
import { AGENTS, type AgentId, SPECIALIST_IDS, type SpecialistId, isSpecialistId } from "./agents";
import { mapWithConcurrencyLimit } from "./parallel";
import type { AgentResult, AgentTask, DelegationTarget } from "./types";

export interface CoordinatorOptions {
	/** Full frozen tool catalog; role registries are subsets of it. */
	catalog: ToolRegistry;
	model: Model;
	chat: ChatFn;
	cwd: string;
	confirmation?: ConfirmationGate;
	maxIterations: number;
	retry?: RetrySettings;
	/** History window passed to the orchestrator's model calls. */
	maxMessages?: number;
	/** Events from specialist loops, for progress display. */
	onSpecialistEvent?: (agent: SpecialistId, event: AgentEvent) => void;
}

export interface OrchestratorOptions {
	messages?: Message[];
}

/** Seed message text: the task, then its context as JSON when there is any. */
export function buildSpecialistSeed(task: AgentTask): string {
	if (Object.keys(task.context).length === 0) return task.description;
	return `${task.description}\n\nContext:\n${formatJson(task.context)}`;
}

export class MultiAgentCoordinator implements DelegationTarget {
	readonly #options: CoordinatorOptions;
	readonly #registries = new Map<AgentId, ToolRegistry>();

	constructor(options: CoordinatorOptions) {
		this.#options = options;
	}

	/** Tool registry bound to a role. Cached; registries are frozen. */
	registryFor(id: AgentId): ToolRegistry {
		let registry = this.#registries.get(id);
		if (!registry) {
			registry = this.#options.catalog.subset(AGENTS[id].tools);
			this.#registries.set(id, registry);
		}
		return registry;
	}

	systemPromptFor(id: AgentId): string {
		const definition = AGENTS[id];
		return renderPrompt(definition.prompt, {
			cwd: this.#options.cwd,
			tools: [...definition.tools],
			specialists: SPECIALIST_IDS.map(specialist => AGENTS[specialist]),
		});
	}

	createOrchestrator(options: OrchestratorOptions = {}): Agent {
		const maxMessages = this.#options.maxMessages;
		return new Agent({
			model: this.#options.model,
			chat: this.#options.chat,
			systemPrompt: this.systemPromptFor("orchestrator"),
			registry: this.registryFor("orchestrator"),
			messages: options.messages,
			confirmation: this.#options.confirmation,
			maxIterations: this.#options.maxIterations,
			retry: this.#options.retry,
			transformContext: maxMessages ? messages => truncateMessages(messages, maxMessages) : undefined,
		});
	}

	/**
	 * Run one task on a fresh specialist loop and wait for its result.
	 * @throws ValidationError for an unknown agent id
	 * @throws ToolNotAllowedError when the target is the orchestrator itself
	 */
	async delegate(task: AgentTask, signal?: AbortSignal): Promise<AgentResult> {
		const agentId = this.#resolveSpecialist(task.agent);
		const prompt: UserMessage = { role: "user", content: buildSpecialistSeed(task), timestamp: Date.now() };
		logger.info("Delegating task", { agent: agentId, task: task.description });

		const stream = agentLoop(
			[prompt],
			{ systemPrompt: this.systemPromptFor(agentId), messages: [] },
			{
				model: this.#options.model,
				chat: this.#options.chat,
				registry: this.registryFor(agentId),
				confirmation: this.#options.confirmation,
				maxIterations: this.#options.maxIterations,
				retry: this.#options.retry,
			},
			signal,
		);
		const run = await logger.timeAsync(`delegate ${agentId}`, async () => {
			for await (const event of stream) {
				this.#options.onSpecialistEvent?.(agentId, event);
			}
			return stream.result();
		});
		const result = buildAgentResult({ ...task, agent: agentId }, run);
		logger.info("Delegation finished", {
			agent: agentId,
			success: result.success,
			toolCalls: result.toolCalls,
			issues: result.issues.length,
		});
		return result;
	}

	/**
	 * Run independent tasks with at most `concurrency` specialists at once.
	 * Tasks share the working directory and shell sessions; callers pick tasks that
	 * do not touch the same files.
	 */
	delegateParallel(tasks: readonly AgentTask[], concurrency: number, signal?: AbortSignal): Promise<AgentResult[]> {
		return mapWithConcurrencyLimit(tasks, concurrency, task => this.delegate(task, signal));
	}

	#resolveSpecialist(agent: string): SpecialistId {
		const id = agent.trim().toLowerCase();
		if (isSpecialistId(id)) return id;
		if (id === "orchestrator") {
			throw new ToolNotAllowedError("delegate_task", "cannot target the orchestrator; delegate to a specialist");
		}
		throw new ValidationError(
			`Unknown agent "${agent}". Choose one of: ${SPECIALIST_IDS.join(", ")}`,
			"delegate_task",
		);
	}
}
