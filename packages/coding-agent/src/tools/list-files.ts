import * as fs from "node:fs/promises";
import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import { glob } from "glob";
import type { ToolSession } from ".";
import { displayPath, resolveToCwd } from "./path-utils";
import { ToolError, throwIfAborted } from "./tool-errors";
import { textResult } from "./tool-result";

export const IGNORED_DIRS = ["**/.git/**", "**/node_modules/**", "**/__pycache__/**", "**/.venv/**", "**/dist/**"];

const MAX_ENTRIES = 500;

const listFilesSchema = Type.Object({
	path: Type.Optional(Type.String({ description: "Directory to list (default: working directory)" })),
	recursive: Type.Optional(Type.Boolean({ description: "Include subdirectories (default: false)" })),
});

type ListFilesParams = Static<typeof listFilesSchema>;

export interface ListFilesDetails {
	path: string;
	count: number;
	truncated: boolean;
}

export class ListFilesTool implements AgentTool<typeof listFilesSchema, ListFilesDetails> {
	readonly name = "list_files";
	readonly label = "List";
	readonly description =
		"List files in a directory. Directories end with '/'. Version control, dependency and build directories are skipped when recursive.";
	readonly parameters = listFilesSchema;

	constructor(private readonly session: ToolSession) {}

	async execute(
		_toolCallId: string,
		params: ListFilesParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<ListFilesDetails>> {
		throwIfAborted(signal);
		const root = resolveToCwd(params.path ?? ".", this.session.cwd);
		const shown = displayPath(root, this.session.cwd);
		try {
			const stat = await fs.stat(root);
			if (!stat.isDirectory()) throw new ToolError(`Not a directory: ${shown}`);
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`Directory not found: ${shown}`);
			throw err;
		}

		const matches = await glob(params.recursive ? "**/*" : "*", {
			cwd: root,
			dot: true,
			mark: true,
			ignore: params.recursive ? IGNORED_DIRS : [],
			signal,
		});
		const entries = matches.filter(entry => entry !== "./").sort((a, b) => a.localeCompare(b));
		const truncated = entries.length > MAX_ENTRIES;
		const shownEntries = truncated ? entries.slice(0, MAX_ENTRIES) : entries;

		let text = shownEntries.join("\n") || "(empty directory)";
		if (truncated) text += `\n\n[Showing ${MAX_ENTRIES} of ${entries.length} entries]`;
		return textResult(text, { path: shown, count: entries.length, truncated });
	}
}
