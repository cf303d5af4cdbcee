/**
 * AgentSession ties an Agent to a persisted session record.
 *
 * Every completed message is appended to the store as the turn runs. A storage
 * failure is reported and logged, but the turn and the in-memory history go on;
 * after a failed create the session simply stays unsaved.
 */
import type { Agent, AgentEvent, AgentRunResult } from "@finch/agent";
import type { Message } from "@finch/ai";
import { logger, toError } from "@finch/utils";
import { createContextMessage } from "./messages";
import { type SessionMetadata, type SessionRecord, type SessionStore, StorageError } from "./session-store";

export interface OpenSessionOptions {
	/** Resume this session id. */
	resumeId?: string;
	/** Start a new session even when a current one exists. */
	forceNew?: boolean;
	metadata?: SessionMetadata;
	/** Project notes; a new session starts with them as a pinned message. */
	projectContext?: string;
}

export interface OpenedSession {
	record: SessionRecord;
	resumed: boolean;
}

/**
 * Resume the requested or current session, or create one.
 * @throws SessionNotFoundError when `resumeId` does not exist
 */
export async function openSession(store: SessionStore, options: OpenSessionOptions = {}): Promise<OpenedSession> {
	if (options.resumeId) {
		const record = await store.load(options.resumeId);
		await store.setCurrent(record.id);
		return { record, resumed: true };
	}
	if (!options.forceNew) {
		const currentId = await store.getCurrent();
		if (currentId) {
			return { record: await store.load(currentId), resumed: true };
		}
	}
	const seed: Message[] = options.projectContext ? [createContextMessage(options.projectContext)] : [];
	const record = await store.create({ metadata: options.metadata, messages: seed });
	await store.setCurrent(record.id);
	return { record, resumed: false };
}

export interface AgentSessionOptions {
	agent: Agent;
	store: SessionStore;
	/** Persisted record the agent's history was loaded from; omitted for an unsaved session. */
	sessionId?: string;
	onStorageError?: (error: StorageError) => void;
}

export class AgentSession {
	readonly agent: Agent;
	readonly #store: SessionStore;
	readonly #onStorageError?: (error: StorageError) => void;
	readonly #unsubscribe: () => void;
	#sessionId?: string;
	#writes: Promise<void> = Promise.resolve();

	constructor(options: AgentSessionOptions) {
		this.agent = options.agent;
		this.#store = options.store;
		this.#sessionId = options.sessionId;
		this.#onStorageError = options.onStorageError;
		this.#unsubscribe = this.agent.subscribe(event => this.#handleEvent(event));
	}

	get sessionId(): string | undefined {
		return this.#sessionId;
	}

	get messages(): readonly Message[] {
		return this.agent.state.messages;
	}

	/**
	 * Run one user turn. Endpoint failures and the iteration cap come back in the
	 * result's `error`; the session stays usable for the next turn.
	 */
	async prompt(text: string): Promise<AgentRunResult> {
		try {
			return await this.agent.prompt(text);
		} finally {
			await this.#writes;
		}
	}

	/** Wait until every message produced so far is on disk (or has failed to get there). */
	async flush(): Promise<void> {
		await this.#writes;
	}

	dispose(): void {
		this.#unsubscribe();
	}

	#handleEvent(event: AgentEvent): void {
		if (event.type !== "message_end") return;
		const sessionId = this.#sessionId;
		if (!sessionId) return;
		const message = event.message;
		this.#writes = this.#writes.then(
			() => this.#persist(sessionId, message),
			() => this.#persist(sessionId, message),
		);
	}

	async #persist(sessionId: string, message: Message): Promise<void> {
		try {
			await this.#store.append(sessionId, message);
		} catch (err) {
			const error =
				err instanceof StorageError
					? err
					: new StorageError(`Failed to save session ${sessionId}: ${toError(err).message}`, sessionId, {
							cause: err,
						});
			logger.error("Session persistence failed", { sessionId, error: error.message });
			this.#onStorageError?.(error);
		}
	}
}
