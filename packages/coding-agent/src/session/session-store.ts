/**
 * Durable conversation history: one JSON record per session under ~/.finch/sessions.
 *
 * Every write replaces the record through a temp file and `rename`, so an interrupted
 * write leaves the previous version in place. Mutations go through one queue per
 * store; appends fired from agent events land in the order they were issued.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Message } from "@finch/ai";
import { SerialQueue, getSessionsDir, isEnoent, isRecord, logger, toError, tryParseJson } from "@finch/utils";
import { countUserMessages, isMessage, previewOf } from "./messages";
import { truncateMessages } from "./truncation";

export const DEFAULT_MAX_MESSAGES = 100;

const CURRENT_POINTER = "current";
const SESSION_ID_PATTERN = /^\d{8}_\d{6}(?:_\d+)?$/;

export interface SessionMetadata {
	cwd?: string;
	model?: string;
	multiAgent?: boolean;
}

export interface SessionRecord {
	id: string;
	/** ISO timestamps */
	createdAt: string;
	updatedAt: string;
	metadata: SessionMetadata;
	messages: Message[];
}

export interface SessionSummary {
	id: string;
	createdAt: string;
	updatedAt: string;
	messageCount: number;
	userMessageCount: number;
	preview: string;
}

export class StorageError extends Error {
	constructor(
		message: string,
		readonly sessionId?: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "StorageError";
	}
}

export class SessionNotFoundError extends StorageError {
	constructor(sessionId: string) {
		super(`Session not found: ${sessionId}`, sessionId);
		this.name = "SessionNotFoundError";
	}
}

export interface SessionStoreOptions {
	/** Defaults to ~/.finch/sessions */
	dir?: string;
	/** Retained messages per session; older ones are truncated on append. */
	maxMessages?: number;
	now?: () => Date;
}

export interface CreateSessionOptions {
	metadata?: SessionMetadata;
	messages?: Message[];
}

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatSessionId(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}

export function isSessionId(value: string): boolean {
	return SESSION_ID_PATTERN.test(value);
}

function parseMetadata(value: unknown): SessionMetadata {
	if (!isRecord(value)) return {};
	const metadata: SessionMetadata = {};
	if (typeof value.cwd === "string") metadata.cwd = value.cwd;
	if (typeof value.model === "string") metadata.model = value.model;
	if (typeof value.multiAgent === "boolean") metadata.multiAgent = value.multiAgent;
	return metadata;
}

function parseRecord(id: string, raw: string): SessionRecord {
	const data = tryParseJson(raw);
	if (!isRecord(data) || !Array.isArray(data.messages)) {
		throw new StorageError(`Session ${id} is not a valid session record`, id);
	}
	const messages = data.messages.filter(isMessage);
	if (messages.length !== data.messages.length) {
		logger.warn("Dropped malformed messages from session", {
			sessionId: id,
			dropped: data.messages.length - messages.length,
		});
	}
	const createdAt = typeof data.createdAt === "string" ? data.createdAt : new Date(0).toISOString();
	return {
		id,
		createdAt,
		updatedAt: typeof data.updatedAt === "string" ? data.updatedAt : createdAt,
		metadata: parseMetadata(data.metadata),
		messages,
	};
}

export class SessionStore {
	readonly dir: string;
	readonly maxMessages: number;
	readonly #now: () => Date;
	readonly #queue = new SerialQueue();
	#tmpCounter = 0;

	constructor(options: SessionStoreOptions = {}) {
		this.dir = options.dir ?? getSessionsDir();
		this.maxMessages = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
		this.#now = options.now ?? (() => new Date());
	}

	/** Create and persist an empty (or seeded) session with a fresh id. */
	create(options: CreateSessionOptions = {}): Promise<SessionRecord> {
		return this.#queue.run(async () => {
			await this.#ensureDir();
			const now = this.#now();
			const id = await this.#allocateId(now);
			const record: SessionRecord = {
				id,
				createdAt: now.toISOString(),
				updatedAt: now.toISOString(),
				metadata: options.metadata ?? {},
				messages: truncateMessages(options.messages ?? [], this.maxMessages),
			};
			await this.#write(record);
			logger.debug("Session created", { sessionId: id });
			return record;
		});
	}

	/**
	 * Append messages and persist. History beyond `maxMessages` is truncated.
	 * @throws SessionNotFoundError when the session does not exist
	 */
	append(id: string, ...messages: Message[]): Promise<SessionRecord> {
		return this.#queue.run(async () => {
			const record = await this.#read(id);
			const updated: SessionRecord = {
				...record,
				updatedAt: this.#now().toISOString(),
				messages: truncateMessages([...record.messages, ...messages], this.maxMessages),
			};
			await this.#write(updated);
			return updated;
		});
	}

	updateMetadata(id: string, metadata: SessionMetadata): Promise<SessionRecord> {
		return this.#queue.run(async () => {
			const record = await this.#read(id);
			const updated = { ...record, metadata: { ...record.metadata, ...metadata } };
			await this.#write(updated);
			return updated;
		});
	}

	/** @throws SessionNotFoundError when the session does not exist */
	async load(id: string): Promise<SessionRecord> {
		return this.#read(id);
	}

	async exists(id: string): Promise<boolean> {
		if (!isSessionId(id)) return false;
		try {
			await fs.access(this.#pathFor(id));
			return true;
		} catch {
			return false;
		}
	}

	/** Summaries, most recently updated first. Unreadable records are skipped. */
	async list(): Promise<SessionSummary[]> {
		let entries: string[];
		try {
			entries = await fs.readdir(this.dir);
		} catch (err) {
			if (isEnoent(err)) return [];
			throw new StorageError(`Failed to list sessions: ${toError(err).message}`, undefined, { cause: err });
		}

		const summaries: SessionSummary[] = [];
		for (const entry of entries) {
			const id = entry.endsWith(".json") ? entry.slice(0, -".json".length) : "";
			if (!isSessionId(id)) continue;
			try {
				const record = await this.#read(id);
				summaries.push({
					id,
					createdAt: record.createdAt,
					updatedAt: record.updatedAt,
					messageCount: record.messages.length,
					userMessageCount: countUserMessages(record.messages),
					preview: previewOf(record.messages),
				});
			} catch (err) {
				logger.warn("Skipping unreadable session", { sessionId: id, error: toError(err).message });
			}
		}
		return summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt) || b.id.localeCompare(a.id));
	}

	/**
	 * Remove a session for good. Clears the current pointer when it pointed here.
	 * @throws SessionNotFoundError when the session does not exist
	 */
	delete(id: string): Promise<void> {
		return this.#queue.run(async () => {
			if (!(await this.exists(id))) throw new SessionNotFoundError(id);
			await this.#unlink(id, this.#pathFor(id));
			if ((await this.#readCurrent()) === id) {
				await this.#unlink(id, this.#currentPath());
			}
			logger.info("Session deleted", { sessionId: id });
		});
	}

	/** Remove every session. Returns how many were removed. */
	clear(): Promise<number> {
		return this.#queue.run(async () => {
			let entries: string[];
			try {
				entries = await fs.readdir(this.dir);
			} catch (err) {
				if (isEnoent(err)) return 0;
				throw new StorageError(`Failed to clear sessions: ${toError(err).message}`, undefined, { cause: err });
			}
			let removed = 0;
			for (const entry of entries) {
				const id = entry.endsWith(".json") ? entry.slice(0, -".json".length) : "";
				if (!isSessionId(id)) continue;
				await this.#unlink(id, this.#pathFor(id));
				removed++;
			}
			await this.#unlink(undefined, this.#currentPath());
			logger.info("Sessions cleared", { removed });
			return removed;
		});
	}

	/** Id of the session `finch chat` resumes by default, if it still exists. */
	async getCurrent(): Promise<string | undefined> {
		const id = await this.#readCurrent();
		if (id && (await this.exists(id))) return id;
		return undefined;
	}

	setCurrent(id: string): Promise<void> {
		return this.#queue.run(async () => {
			if (!(await this.exists(id))) throw new SessionNotFoundError(id);
			await this.#ensureDir();
			await this.#atomicWrite(this.#currentPath(), `${id}\n`, id);
		});
	}

	#pathFor(id: string): string {
		return path.join(this.dir, `${id}.json`);
	}

	#currentPath(): string {
		return path.join(this.dir, CURRENT_POINTER);
	}

	async #ensureDir(): Promise<void> {
		try {
			await fs.mkdir(this.dir, { recursive: true });
		} catch (err) {
			throw new StorageError(`Failed to create ${this.dir}: ${toError(err).message}`, undefined, { cause: err });
		}
	}

	async #allocateId(now: Date): Promise<string> {
		const base = formatSessionId(now);
		let candidate = base;
		for (let suffix = 2; await this.exists(candidate); suffix++) {
			candidate = `${base}_${suffix}`;
		}
		return candidate;
	}

	async #read(id: string): Promise<SessionRecord> {
		if (!isSessionId(id)) throw new SessionNotFoundError(id);
		let raw: string;
		try {
			raw = await fs.readFile(this.#pathFor(id), "utf8");
		} catch (err) {
			if (isEnoent(err)) throw new SessionNotFoundError(id);
			throw new StorageError(`Failed to read session ${id}: ${toError(err).message}`, id, { cause: err });
		}
		return parseRecord(id, raw);
	}

	async #readCurrent(): Promise<string | undefined> {
		try {
			const id = (await fs.readFile(this.#currentPath(), "utf8")).trim();
			return isSessionId(id) ? id : undefined;
		} catch (err) {
			if (isEnoent(err)) return undefined;
			throw new StorageError(`Failed to read current session: ${toError(err).message}`, undefined, { cause: err });
		}
	}

	async #write(record: SessionRecord): Promise<void> {
		await this.#atomicWrite(this.#pathFor(record.id), `${JSON.stringify(record, null, 2)}\n`, record.id);
	}

	async #atomicWrite(target: string, content: string, sessionId: string): Promise<void> {
		const tmp = `${target}.${process.pid}.${++this.#tmpCounter}.tmp`;
		try {
			await fs.writeFile(tmp, content, "utf8");
			await fs.rename(tmp, target);
		} catch (err) {
			await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
				logger.warn("Failed to remove temp file", { path: tmp, error: toError(cleanupErr).message });
			});
			throw new StorageError(`Failed to save session ${sessionId}: ${toError(err).message}`, sessionId, {
				cause: err,
			});
		}
	}

	async #unlink(sessionId: string | undefined, target: string): Promise<void> {
		try {
			await fs.rm(target, { force: true });
		} catch (err) {
			throw new StorageError(`Failed to remove ${target}: ${toError(err).message}`, sessionId, { cause: err });
		}
	}
}
