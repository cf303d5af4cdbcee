/**
 * Wiring for a chat session: settings → model endpoint → tools → agent → persisted session.
 *
 * The CLI and tests both go through `createAgentSession`; tests pass a scripted `chat`
 * and an isolated Settings instance.
 */
import { Agent, type AgentEvent, type ConfirmationGate, type RetrySettings, declineAll } from "@finch/agent";
import { type ChatFn, type Model, createOllamaModel, createOpenAICompatibleChat } from "@finch/ai";
import { logger } from "@finch/utils";
import { loadProjectContext, renderPrompt } from "./config/prompt-templates";
import type { Settings } from "./config/settings";
import type { Prompter } from "./modes/types";
import { MultiAgentCoordinator } from "./multi-agent/coordinator";
import type { SpecialistId } from "./multi-agent/agents";
import { AgentSession, openSession } from "./session/agent-session";
import { type SessionRecord, SessionStore, StorageError } from "./session/session-store";
import { truncateMessages } from "./session/truncation";
import { ShellSessionManager } from "./shell/shell-manager";
import { SINGLE_AGENT_EXCLUDED, type ToolSession, createToolCatalog } from "./tools";

export interface CreateAgentSessionOptions {
	settings: Settings;
	cwd?: string;
	/** Model endpoint; defaults to the OpenAI-compatible client for `model.host`. */
	chat?: ChatFn;
	/** Line prompter for plan selection. Without one, propose_plan fails. */
	prompter?: Prompter;
	/** Gate for dangerous calls; defaults to declining every one. */
	confirmation?: ConfirmationGate;
	store?: SessionStore;
	/** Overrides `agent.multiAgent`. */
	multiAgent?: boolean;
	resumeId?: string;
	forceNew?: boolean;
	/** Don't persist the conversation. */
	ephemeral?: boolean;
	onSpecialistEvent?: (agent: SpecialistId, event: AgentEvent) => void;
	onStorageError?: (error: StorageError) => void;
}

export interface CreateAgentSessionResult {
	session: AgentSession;
	agent: Agent;
	store: SessionStore;
	shells: ShellSessionManager;
	model: Model;
	multiAgent: boolean;
	/** True when an existing session's history was loaded. */
	resumed: boolean;
	coordinator?: MultiAgentCoordinator;
	/** Flush pending session writes and stop every shell. */
	dispose(): Promise<void>;
}

export interface BuildSystemPromptOptions {
	cwd: string;
	tools: readonly string[];
	date?: Date;
}

export function buildSystemPrompt(options: BuildSystemPromptOptions): string {
	const date = options.date ?? new Date();
	return renderPrompt("system/default", {
		cwd: options.cwd,
		date: date.toISOString().slice(0, 10),
		tools: [...options.tools],
	});
}

async function openRecord(
	store: SessionStore,
	options: CreateAgentSessionOptions,
	cwd: string,
	modelName: string,
	multiAgent: boolean,
	onStorageError: (error: StorageError) => void,
): Promise<{ record?: SessionRecord; resumed: boolean }> {
	const projectContext = loadProjectContext(cwd);
	try {
		return await openSession(store, {
			resumeId: options.resumeId,
			forceNew: options.forceNew,
			metadata: { cwd, model: modelName, multiAgent },
			projectContext,
		});
	} catch (err) {
		// A session asked for by id must exist; otherwise chat unsaved.
		if (options.resumeId || !(err instanceof StorageError)) throw err;
		onStorageError(err);
		return { resumed: false };
	}
}

/**
 * Build an agent bound to a persisted session.
 * @throws SessionNotFoundError when `resumeId` names no session
 */
export async function createAgentSession(options: CreateAgentSessionOptions): Promise<CreateAgentSessionResult> {
	const { settings } = options;
	const cwd = options.cwd ?? process.cwd();
	const multiAgent = options.multiAgent ?? settings.get("agent.multiAgent");
	const model = createOllamaModel(settings.get("model.host"), settings.get("model.name"));
	const chat = options.chat ?? createOpenAICompatibleChat({ apiKey: settings.get("model.apiKey") });
	const confirmation = options.confirmation ?? declineAll;
	const maxIterations = settings.get("agent.maxIterations");
	const maxMessages = settings.get("session.maxMessages");
	const retry: RetrySettings = {
		maxRetries: settings.get("retry.maxRetries"),
		baseDelayMs: settings.get("retry.baseDelayMs"),
	};
	const onStorageError =
		options.onStorageError ??
		((error: StorageError) => logger.warn("Continuing without saving", { error: error.message }));

	const shells = new ShellSessionManager({
		cwd,
		idleTimeoutMs: settings.get("shell.idleTimeoutSeconds") * 1000,
		defaultTimeoutMs: settings.get("shell.defaultTimeoutSeconds") * 1000,
	});
	shells.startIdleSweep(settings.get("shell.sweepIntervalSeconds") * 1000);

	const toolSession: ToolSession = { cwd, settings, shells, prompter: options.prompter };
	const catalog = createToolCatalog(toolSession);
	const store = options.store ?? new SessionStore({ maxMessages });

	let record: SessionRecord | undefined;
	let resumed = false;
	try {
		if (!options.ephemeral) {
			({ record, resumed } = await openRecord(store, options, cwd, model.id, multiAgent, onStorageError));
		}
	} catch (err) {
		shells.dispose();
		throw err;
	}
	const messages = record ? [...record.messages] : [];

	let agent: Agent;
	let coordinator: MultiAgentCoordinator | undefined;
	if (multiAgent) {
		coordinator = new MultiAgentCoordinator({
			catalog,
			model,
			chat,
			cwd,
			confirmation,
			maxIterations,
			retry,
			maxMessages,
			onSpecialistEvent: options.onSpecialistEvent,
		});
		toolSession.delegation = coordinator;
		agent = coordinator.createOrchestrator({ messages });
	} else {
		const registry = catalog.without(SINGLE_AGENT_EXCLUDED);
		agent = new Agent({
			model,
			chat,
			systemPrompt: buildSystemPrompt({ cwd, tools: registry.names() }),
			registry,
			messages,
			confirmation,
			maxIterations,
			retry,
			transformContext: history => truncateMessages(history, maxMessages),
		});
	}

	if (record && resumed && record.metadata.multiAgent !== multiAgent) {
		try {
			await store.updateMetadata(record.id, { multiAgent });
		} catch (err) {
			if (!(err instanceof StorageError)) throw err;
			onStorageError(err);
		}
	}

	const session = new AgentSession({ agent, store, sessionId: record?.id, onStorageError });
	logger.info("Agent session ready", {
		sessionId: record?.id,
		resumed,
		multiAgent,
		model: model.id,
		messages: messages.length,
	});

	return {
		session,
		agent,
		store,
		shells,
		model,
		multiAgent,
		resumed,
		coordinator,
		async dispose() {
			try {
				await session.flush();
			} finally {
				session.dispose();
				shells.dispose();
			}
		},
	};
}
