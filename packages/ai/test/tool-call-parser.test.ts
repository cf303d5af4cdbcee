import { extractToolLines, parseToolLine } from "@finch/ai/utils/tool-call-parser";
import { describe, expect, it } from "vitest";

describe("parseToolLine", () => {
	it("parses a well-formed line", () => {
		expect(parseToolLine('tool: read_file({"path": "README.md"})')).toEqual({
			kind: "call",
			name: "read_file",
			arguments: { path: "README.md" },
		});
	});

	it("accepts empty parentheses as no arguments", () => {
		expect(parseToolLine("tool:list_files()")).toEqual({ kind: "call", name: "list_files", arguments: {} });
	});

	it("rejects non-object JSON", () => {
		expect(parseToolLine('tool: run_bash(["ls"])')).toEqual({
			kind: "error",
			line: 'tool: run_bash(["ls"])',
			reason: "arguments must be a JSON object",
		});
	});

	it("rejects trailing text after the closing parenthesis", () => {
		const result = parseToolLine('tool: read_file({"path": "a"}) please');
		expect(result.kind).toBe("error");
	});

	it("rejects invalid JSON instead of guessing", () => {
		const result = parseToolLine("tool: read_file({path: a})");
		expect(result.kind).toBe("error");
		if (result.kind === "error") {
			expect(result.reason).toMatch(/^arguments are not valid JSON/);
		}
	});
});

describe("extractToolLines", () => {
	it("only looks at lines starting with tool:", () => {
		const text = ["I'll look at the file.", 'tool: read_file({"path": "a.ts"})', "Thanks"].join("\n");
		expect(extractToolLines(text)).toEqual([{ kind: "call", name: "read_file", arguments: { path: "a.ts" } }]);
	});
});
