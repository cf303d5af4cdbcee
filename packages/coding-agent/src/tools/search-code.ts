import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import { glob } from "glob";
import type { ToolSession } from ".";
import { IGNORED_DIRS } from "./list-files";
import { displayPath, resolveToCwd } from "./path-utils";
import { renderError, ToolError, throwIfAborted } from "./tool-errors";
import { textResult } from "./tool-result";

const MAX_MATCHES = 200;
const MAX_FILE_BYTES = 1024 * 1024;
const MAX_LINE_CHARS = 300;

const searchCodeSchema = Type.Object({
	pattern: Type.String({ description: "Regular expression (JavaScript syntax) matched against each line" }),
	path: Type.Optional(Type.String({ description: "File or directory to search (default: working directory)" })),
	glob: Type.Optional(Type.String({ description: "Only search files matching this glob, e.g. '**/*.py'" })),
	ignore_case: Type.Optional(Type.Boolean({ description: "Case-insensitive match (default: false)" })),
});

type SearchCodeParams = Static<typeof searchCodeSchema>;

export interface SearchCodeDetails {
	matches: number;
	filesSearched: number;
	truncated: boolean;
}

export class SearchCodeTool implements AgentTool<typeof searchCodeSchema, SearchCodeDetails> {
	readonly name = "search_code";
	readonly label = "Search";
	readonly description =
		"Search file contents with a regular expression. Returns 'path:line: text' for each matching line.";
	readonly parameters = searchCodeSchema;

	constructor(private readonly session: ToolSession) {}

	async execute(
		_toolCallId: string,
		params: SearchCodeParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<SearchCodeDetails>> {
		let regex: RegExp;
		try {
			regex = new RegExp(params.pattern, params.ignore_case ? "i" : "");
		} catch (err) {
			throw new ToolError(`Invalid pattern: ${renderError(err)}`);
		}

		const target = resolveToCwd(params.path ?? ".", this.session.cwd);
		const files = await this.#collectFiles(target, params.glob, signal);

		const lines: string[] = [];
		let truncated = false;
		for (const file of files) {
			throwIfAborted(signal);
			const content = await readTextFile(file);
			if (content === undefined) continue;
			const shown = displayPath(file, this.session.cwd);
			const fileLines = content.split("\n");
			for (let i = 0; i < fileLines.length; i++) {
				const line = fileLines[i] ?? "";
				if (!regex.test(line)) continue;
				if (lines.length >= MAX_MATCHES) {
					truncated = true;
					break;
				}
				const clipped = line.length > MAX_LINE_CHARS ? `${line.slice(0, MAX_LINE_CHARS)}...` : line;
				lines.push(`${shown}:${i + 1}: ${clipped.trim()}`);
			}
			if (truncated) break;
		}

		let text = lines.join("\n") || "No matches found";
		if (truncated) text += `\n\n[Stopped at ${MAX_MATCHES} matches; narrow the pattern or path]`;
		return textResult(text, { matches: lines.length, filesSearched: files.length, truncated });
	}

	async #collectFiles(target: string, pattern: string | undefined, signal?: AbortSignal): Promise<string[]> {
		let isDirectory: boolean;
		try {
			isDirectory = (await fs.stat(target)).isDirectory();
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`Path not found: ${displayPath(target, this.session.cwd)}`);
			throw err;
		}
		if (!isDirectory) return [target];
		const matches = await glob(pattern ?? "**/*", {
			cwd: target,
			nodir: true,
			dot: false,
			ignore: IGNORED_DIRS,
			signal,
		});
		return matches.sort((a, b) => a.localeCompare(b)).map(file => path.join(target, file));
	}
}

/** File text, or undefined for large, binary or unreadable files. */
async function readTextFile(file: string): Promise<string | undefined> {
	try {
		const stat = await fs.stat(file);
		if (stat.size > MAX_FILE_BYTES) return undefined;
		const buffer = await fs.readFile(file);
		if (buffer.subarray(0, 8192).includes(0)) return undefined;
		return buffer.toString("utf8");
	} catch (err) {
		if (isEnoent(err)) return undefined;
		throw err;
	}
}
