import { Agent } from "@finch/agent";
import { AgentSession, openSession } from "@finch/coding-agent/session/agent-session";
import {
	type SessionRecord,
	SessionNotFoundError,
	SessionStore,
	type StorageError,
} from "@finch/coding-agent/session/session-store";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { assistantMsg, createTempDir, removeTempDir, scriptedChat, testModel } from "../utilities";

class FailingStore extends SessionStore {
	override append(): Promise<SessionRecord> {
		return Promise.reject(new Error("disk full"));
	}
}

describe("openSession", () => {
	let dir: string;
	let store: SessionStore;

	beforeEach(() => {
		dir = createTempDir();
		store = new SessionStore({ dir, now: () => new Date(2026, 4, 2, 14, 0, 0) });
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	it("creates a session seeded with the project context and makes it current", async () => {
		const { record, resumed } = await openSession(store, { projectContext: "Use pnpm, not npm." });

		expect(resumed).toBe(false);
		expect(record.messages).toHaveLength(1);
		expect(record.messages[0]).toMatchObject({
			role: "user",
			content: "# Project context\n\nUse pnpm, not npm.",
			pinned: true,
		});
		expect(await store.getCurrent()).toBe(record.id);
	});

	it("resumes the current session unless a new one is forced", async () => {
		const first = await openSession(store);
		const again = await openSession(store);
		expect(again.resumed).toBe(true);
		expect(again.record.id).toBe(first.record.id);

		const fresh = await openSession(store, { forceNew: true });
		expect(fresh.resumed).toBe(false);
		expect(fresh.record.id).toBe("20260502_140000_2");
		expect(await store.getCurrent()).toBe("20260502_140000_2");
	});

	it("resumes a session by id", async () => {
		const first = await openSession(store);
		await openSession(store, { forceNew: true });

		const resumed = await openSession(store, { resumeId: first.record.id });
		expect(resumed.resumed).toBe(true);
		expect(await store.getCurrent()).toBe(first.record.id);
	});

	it("fails for an unknown session id", async () => {
		await expect(openSession(store, { resumeId: "20200101_000000" })).rejects.toBeInstanceOf(SessionNotFoundError);
	});
});

describe("AgentSession", () => {
	let dir: string;

	beforeEach(() => {
		dir = createTempDir();
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	it("persists every message of a turn", async () => {
		const store = new SessionStore({ dir });
		const record = await store.create();
		const agent = new Agent({ model: testModel, chat: scriptedChat([assistantMsg("Hello!")]) });
		const session = new AgentSession({ agent, store, sessionId: record.id });

		const result = await session.prompt("Hi");

		expect(result.finalText).toBe("Hello!");
		const saved = await store.load(record.id);
		expect(saved.messages.map(m => m.role)).toEqual(["user", "assistant"]);
		session.dispose();
	});

	it("reports storage failures and keeps the conversation in memory", async () => {
		const store = new FailingStore({ dir });
		const errors: StorageError[] = [];
		const agent = new Agent({ model: testModel, chat: scriptedChat([assistantMsg("Still here")]) });
		const session = new AgentSession({
			agent,
			store,
			sessionId: "20260101_000000",
			onStorageError: error => errors.push(error),
		});

		const result = await session.prompt("Hi");

		expect(result.finalText).toBe("Still here");
		expect(session.messages).toHaveLength(2);
		expect(errors.map(e => e.message)).toEqual([
			"Failed to save session 20260101_000000: disk full",
			"Failed to save session 20260101_000000: disk full",
		]);
		session.dispose();
	});

	it("does not write when the session is unsaved", async () => {
		const store = new FailingStore({ dir });
		const errors: StorageError[] = [];
		const agent = new Agent({ model: testModel, chat: scriptedChat([assistantMsg("ok")]) });
		const session = new AgentSession({ agent, store, onStorageError: error => errors.push(error) });

		await session.prompt("Hi");
		expect(errors).toEqual([]);
		expect(session.sessionId).toBeUndefined();
	});
});
