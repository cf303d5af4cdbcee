import * as fs from "node:fs/promises";
import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { displayPath, resolveToCwd } from "./path-utils";
import { ToolError, throwIfAborted } from "./tool-errors";
import { textResult } from "./tool-result";

const DEFAULT_LINE_LIMIT = 2000;
const MAX_LINE_CHARS = 2000;

const readFileSchema = Type.Object({
	path: Type.String({ description: "File to read, relative to the working directory or absolute" }),
	offset: Type.Optional(Type.Integer({ minimum: 1, description: "First line to return (1-based)" })),
	limit: Type.Optional(Type.Integer({ minimum: 1, description: `Lines to return (default ${DEFAULT_LINE_LIMIT})` })),
});

type ReadFileParams = Static<typeof readFileSchema>;

export interface ReadFileDetails {
	path: string;
	totalLines: number;
	startLine: number;
	endLine: number;
}

export class ReadFileTool implements AgentTool<typeof readFileSchema, ReadFileDetails> {
	readonly name = "read_file";
	readonly label = "Read";
	readonly description =
		"Read a text file. Long files are returned in windows: pass offset and limit to read further.";
	readonly parameters = readFileSchema;

	constructor(private readonly session: ToolSession) {}

	async execute(
		_toolCallId: string,
		params: ReadFileParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<ReadFileDetails>> {
		throwIfAborted(signal);
		const absolute = resolveToCwd(params.path, this.session.cwd);
		const shown = displayPath(absolute, this.session.cwd);

		let content: string;
		try {
			const stat = await fs.stat(absolute);
			if (stat.isDirectory()) throw new ToolError(`Path is a directory: ${shown}. Use list_files instead.`);
			content = await fs.readFile(absolute, "utf8");
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`File not found: ${shown}`);
			throw err;
		}

		const lines = content.split("\n");
		if (lines.at(-1) === "") lines.pop();
		const start = (params.offset ?? 1) - 1;
		if (lines.length > 0 && start >= lines.length) {
			throw new ToolError(`Offset ${start + 1} is past the end of ${shown} (${lines.length} lines)`);
		}
		const window = lines.slice(start, start + (params.limit ?? DEFAULT_LINE_LIMIT));
		const end = start + window.length;

		let text = window
			.map(line => (line.length > MAX_LINE_CHARS ? `${line.slice(0, MAX_LINE_CHARS)}... [line truncated]` : line))
			.join("\n");
		if (lines.length === 0) text = "(empty file)";
		else if (start > 0 || end < lines.length) {
			text += `\n\n[Showing lines ${start + 1}-${end} of ${lines.length}. Use offset=${end + 1} to continue.]`;
		}

		return textResult(text, { path: shown, totalLines: lines.length, startLine: start + 1, endLine: end });
	}
}
