import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent, logger } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { displayPath, resolveToCwd } from "./path-utils";
import { ToolError, throwIfAborted } from "./tool-errors";
import { textResult } from "./tool-result";

const PREVIEW_CHARS = 1200;

const editFileSchema = Type.Object({
	path: Type.String({ description: "File to edit or create" }),
	old_str: Type.String({
		description: "Exact text to replace; must occur exactly once. Empty string creates or overwrites the file.",
	}),
	new_str: Type.String({ description: "Replacement text (the whole file content when old_str is empty)" }),
});

type EditFileParams = Static<typeof editFileSchema>;

export interface EditFileDetails {
	/** Path as shown to the model; collected into a specialist's modified resources. */
	path: string;
	created: boolean;
}

function countOccurrences(haystack: string, needle: string): number {
	let count = 0;
	for (let at = haystack.indexOf(needle); at >= 0; at = haystack.indexOf(needle, at + needle.length)) {
		count++;
	}
	return count;
}

function clip(text: string): string {
	return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}\n... (${text.length} chars)` : text;
}

export class EditFileTool implements AgentTool<typeof editFileSchema, EditFileDetails> {
	readonly name = "edit_file";
	readonly label = "Edit";
	readonly description =
		"Replace one exact occurrence of old_str with new_str in a file, or create/overwrite a file when old_str is empty. Read the file first.";
	readonly parameters = editFileSchema;
	readonly dangerous = true;

	constructor(private readonly session: ToolSession) {}

	describeCall(args: EditFileParams): string {
		if (args.old_str === "") return `Write ${args.path}:\n${clip(args.new_str)}`;
		return `Edit ${args.path}:\n--- replace\n${clip(args.old_str)}\n+++ with\n${clip(args.new_str)}`;
	}

	async execute(
		_toolCallId: string,
		params: EditFileParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<EditFileDetails>> {
		throwIfAborted(signal);
		const absolute = resolveToCwd(params.path, this.session.cwd);
		const shown = displayPath(absolute, this.session.cwd);

		if (params.old_str === "") {
			const existed = await fileExists(absolute);
			await fs.mkdir(path.dirname(absolute), { recursive: true });
			await fs.writeFile(absolute, params.new_str, "utf8");
			logger.debug("File written", { path: absolute, existed });
			return textResult(`${existed ? "Overwrote" : "Created"} ${shown}`, { path: shown, created: !existed });
		}

		let content: string;
		try {
			content = await fs.readFile(absolute, "utf8");
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`File not found: ${shown}`);
			throw err;
		}

		const occurrences = countOccurrences(content, params.old_str);
		if (occurrences === 0) {
			throw new ToolError(`old_str not found in ${shown}. Read the file and copy the text exactly.`);
		}
		if (occurrences > 1) {
			throw new ToolError(
				`old_str occurs ${occurrences} times in ${shown}; include more surrounding lines so it is unique.`,
			);
		}

		const at = content.indexOf(params.old_str);
		const updated = content.slice(0, at) + params.new_str + content.slice(at + params.old_str.length);
		await fs.writeFile(absolute, updated, "utf8");
		logger.debug("File edited", { path: absolute });
		return textResult(`Edited ${shown}`, { path: shown, created: false });
	}
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch (err) {
		if (isEnoent(err)) return false;
		throw err;
	}
}
