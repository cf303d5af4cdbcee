/**
 * Tests for prompt rendering: the list/join helpers, bundled prompts and project context.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { loadProjectContext, renderPrompt, renderPromptTemplate } from "@finch/coding-agent/config/prompt-templates";
import { buildSystemPrompt } from "@finch/coding-agent/sdk";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, removeTempDir } from "./utilities";

describe("renderPromptTemplate", () => {
	it("renders lists with prefix and join", () => {
		expect(renderPromptTemplate('{{#list items prefix="- " join="\\n"}}{{this}}{{/list}}', { items: ["a", "b"] })).toBe(
			"- a\n- b",
		);
		expect(renderPromptTemplate('{{#list items prefix="[" suffix="]" join=" "}}{{name}}{{/list}}', {
			items: [{ name: "x" }, { name: "y" }],
		})).toBe("[x] [y]");
	});

	it("renders nothing for an empty or missing list", () => {
		expect(renderPromptTemplate("A{{#list items}}{{this}}{{/list}}B", { items: [] })).toBe("AB");
		expect(renderPromptTemplate("A{{#list items}}{{this}}{{/list}}B")).toBe("AB");
	});

	it("joins arrays with a separator", () => {
		expect(renderPromptTemplate("{{join tools}}", { tools: ["a", "b"] })).toBe("a, b");
		expect(renderPromptTemplate('{{join tools " | "}}', { tools: ["a", "b"] })).toBe("a | b");
	});

	it("leaves values unescaped and trims the result", () => {
		expect(renderPromptTemplate("  {{code}}\n", { code: "a < b && c" })).toBe("a < b && c");
	});
});

describe("bundled prompts", () => {
	it("builds the system prompt from the working directory, date and tools", () => {
		const prompt = buildSystemPrompt({
			cwd: "/work/app",
			tools: ["read_file", "edit_file"],
			date: new Date("2026-03-04T10:00:00Z"),
		});

		expect(prompt).toContain("Working directory: /work/app\nDate: 2026-03-04");
		expect(prompt).toContain("You can call these tools:\n- read_file\n- edit_file\n");
	});

	it("fills in the project name for the context template", () => {
		expect(renderPrompt("templates/project-context", { project: "demo" }).startsWith("# demo\n")).toBe(true);
	});
});

describe("loadProjectContext", () => {
	let dir: string;

	beforeEach(() => {
		dir = createTempDir();
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	it("reads the project's context notes", () => {
		fs.mkdirSync(path.join(dir, ".finch"));
		fs.writeFileSync(path.join(dir, ".finch", "context.md"), "\nUse tabs.\n\n");
		expect(loadProjectContext(dir)).toBe("Use tabs.");
	});

	it("returns undefined when there are no notes or they are blank", () => {
		expect(loadProjectContext(dir)).toBeUndefined();
		fs.mkdirSync(path.join(dir, ".finch"));
		fs.writeFileSync(path.join(dir, ".finch", "context.md"), "  \n");
		expect(loadProjectContext(dir)).toBeUndefined();
	});
});
