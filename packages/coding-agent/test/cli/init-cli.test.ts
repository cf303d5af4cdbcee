import * as fs from "node:fs";
import * as path from "node:path";
import { CommandError, formatCommandError } from "@finch/coding-agent/cli/errors";
import { initProjectContext } from "@finch/coding-agent/cli/init-cli";
import { modelIsListed } from "@finch/coding-agent/cli/chat-cli";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, removeTempDir } from "../utilities";

describe("initProjectContext", () => {
	let dir: string;

	beforeEach(() => {
		dir = path.join(createTempDir(), "demo-app");
		fs.mkdirSync(dir);
	});

	afterEach(() => {
		removeTempDir(path.dirname(dir));
	});

	it("writes the context template named after the directory", async () => {
		const created = await initProjectContext(dir);

		expect(created).toBe(path.join(dir, ".finch", "context.md"));
		const text = fs.readFileSync(created, "utf8");
		expect(text.startsWith("# demo-app\n")).toBe(true);
		expect(text).toContain("## Conventions");
		expect(text.endsWith("\n")).toBe(true);
	});

	it("refuses to overwrite existing notes", async () => {
		await initProjectContext(dir);
		fs.writeFileSync(path.join(dir, ".finch", "context.md"), "mine");

		const attempt = initProjectContext(dir);
		await expect(attempt).rejects.toBeInstanceOf(CommandError);
		await expect(attempt).rejects.toThrow(`init project: ${path.join(dir, ".finch", "context.md")} already exists`);
		expect(fs.readFileSync(path.join(dir, ".finch", "context.md"), "utf8")).toBe("mine");
	});
});

describe("formatCommandError", () => {
	it("uses the failing action from a CommandError", () => {
		expect(formatCommandError("finch", new CommandError("resume session", "Session not found: x"))).toBe(
			"Error: resume session: Session not found: x",
		);
	});

	it("wraps other errors with the given action", () => {
		expect(formatCommandError("list sessions", new Error("EACCES"))).toBe("Error: list sessions: EACCES");
		expect(formatCommandError("list sessions", "plain")).toBe("Error: list sessions: plain");
	});
});

describe("modelIsListed", () => {
	it("matches exact names and untagged names", () => {
		expect(modelIsListed(["llama3.2:latest", "qwen2.5:7b"], "llama3.2")).toBe(true);
		expect(modelIsListed(["qwen2.5:7b"], "qwen2.5:7b")).toBe(true);
		expect(modelIsListed(["llama3.2:latest"], "llama3")).toBe(false);
	});
});
