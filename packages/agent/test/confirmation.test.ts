import {
	type ConfirmationRequest,
	createPromptConfirmationGate,
	isAffirmative,
	needsConfirmation,
	renderCallPreview,
} from "@finch/agent/confirmation";
import type { AgentTool } from "@finch/agent/types";
import { type Static, Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";

const sqlSchema = Type.Object({ query: Type.String() });

const sqlTool: AgentTool<typeof sqlSchema> = {
	name: "sqlite_query",
	label: "SQLite",
	description: "Run a query",
	parameters: sqlSchema,
	requiresConfirmation: (args: Static<typeof sqlSchema>) => !/^\s*select/i.test(args.query),
	describeCall: (args: Static<typeof sqlSchema>) => args.query,
	execute: async () => ({ content: [] }),
};

const request: ConfirmationRequest = {
	toolCallId: "c1",
	toolName: "run_bash",
	label: "Bash",
	args: { command: "ls" },
	preview: "ls",
};

describe("isAffirmative", () => {
	it.each(["y", "Y", "yes", " YES "])("accepts %j", answer => {
		expect(isAffirmative(answer)).toBe(true);
	});

	it.each(["", "n", "no", "sure", undefined])("declines %j", answer => {
		expect(isAffirmative(answer)).toBe(false);
	});
});

describe("needsConfirmation", () => {
	it("evaluates the per-call policy", () => {
		expect(needsConfirmation(sqlTool, { query: "SELECT 1" })).toBe(false);
		expect(needsConfirmation(sqlTool, { query: "DROP TABLE t" })).toBe(true);
	});

	it("falls back to the static flag", () => {
		const { requiresConfirmation: _omit, ...plain } = sqlTool;
		expect(needsConfirmation({ ...plain, dangerous: true }, { query: "SELECT 1" })).toBe(true);
		expect(needsConfirmation(plain, { query: "DROP TABLE t" })).toBe(false);
	});

	it("keeps the static flag when the per-call policy says no", () => {
		const tool: AgentTool<typeof sqlSchema> = { ...sqlTool, dangerous: true };
		expect(needsConfirmation(tool, { query: "SELECT 1" })).toBe(true);
	});
});

describe("renderCallPreview", () => {
	it("prefers the tool's own rendering", () => {
		expect(renderCallPreview(sqlTool, { query: "DELETE FROM t" })).toBe("DELETE FROM t");
	});
});

describe("createPromptConfirmationGate", () => {
	it("approves only an explicit yes", async () => {
		expect(await createPromptConfirmationGate(async () => "yes").confirm(request)).toBe(true);
		expect(await createPromptConfirmationGate(async () => "").confirm(request)).toBe(false);
	});

	it("treats EOF and interrupts as a decline", async () => {
		expect(await createPromptConfirmationGate(async () => undefined).confirm(request)).toBe(false);
		const interrupted = createPromptConfirmationGate(async () => {
			throw new Error("interrupted");
		});
		expect(await interrupted.confirm(request)).toBe(false);
	});
});
