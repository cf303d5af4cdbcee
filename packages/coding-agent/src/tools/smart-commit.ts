import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { type ProcessResult, formatProcessOutput, runProcess } from "../exec/bash-executor";
import { ToolError } from "./tool-errors";
import { textResult } from "./tool-result";
import { clampTimeout } from "./tool-timeouts";

/** File lists longer than this stay out of a generated message. */
const MAX_LISTED_FILES = 5;

const smartCommitSchema = Type.Object({
	files: Type.Optional(Type.Array(Type.String(), { description: "Paths to stage (default: every change)" })),
	message: Type.Optional(Type.String({ description: "Commit message (default: generated from the changes)" })),
});

type SmartCommitParams = Static<typeof smartCommitSchema>;

export interface StagedChange {
	/** First letter of git's name-status code: A, M, D, R, C or T. */
	status: string;
	path: string;
}

export interface SmartCommitDetails {
	message: string;
	files: number;
}

/** Parse `git diff --name-status` output; renames and copies report their new path. */
export function parseNameStatus(output: string): StagedChange[] {
	const changes: StagedChange[] = [];
	for (const line of output.split("\n")) {
		const fields = line.split("\t");
		const code = fields[0];
		const last = fields[fields.length - 1];
		if (!code || fields.length < 2 || !last) continue;
		changes.push({ status: code.charAt(0), path: last });
	}
	return changes;
}

/**
 * Commit message for staged changes: counts per kind, then the paths when there
 * are only a few, e.g. "Add 1 file(s), Update 2 file(s)\n\n- a.py\n- b.py\n- c.py".
 */
export function summarizeChanges(changes: readonly StagedChange[]): string {
	const added = changes.filter(c => c.status === "A").length;
	const removed = changes.filter(c => c.status === "D").length;
	const updated = changes.length - added - removed;
	const parts: string[] = [];
	if (added > 0) parts.push(`Add ${added} file(s)`);
	if (updated > 0) parts.push(`Update ${updated} file(s)`);
	if (removed > 0) parts.push(`Remove ${removed} file(s)`);
	const subject = parts.length > 0 ? parts.join(", ") : "Update files";
	if (changes.length === 0 || changes.length > MAX_LISTED_FILES) return subject;
	return `${subject}\n\n${changes.map(c => `- ${c.path}`).join("\n")}`;
}

export class SmartCommitTool implements AgentTool<typeof smartCommitSchema, SmartCommitDetails> {
	readonly name = "smart_commit";
	readonly label = "Smart commit";
	readonly description =
		"Stage changes and commit them. Without a message, one is written from the staged files (added, updated, removed).";
	readonly parameters = smartCommitSchema;
	readonly dangerous = true;

	constructor(private readonly session: ToolSession) {}

	describeCall(args: SmartCommitParams): string {
		const staging = args.files?.length ? `git add -- ${args.files.join(" ")}` : "git add -A";
		const commit =
			args.message !== undefined
				? `git commit -m ${JSON.stringify(args.message)}`
				: "git commit (message generated from the staged changes)";
		return `${staging}\n${commit}`;
	}

	async execute(
		_toolCallId: string,
		params: SmartCommitParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<SmartCommitDetails>> {
		const status = await this.#git(["status", "--porcelain"], signal);
		if (!status.trim()) throw new ToolError("No changes to commit");

		await this.#git(params.files?.length ? ["add", "--", ...params.files] : ["add", "-A"], signal);
		const staged = parseNameStatus(await this.#git(["diff", "--cached", "--name-status"], signal));
		if (staged.length === 0) throw new ToolError("No changes to commit");

		const message = params.message?.trim() ? params.message : summarizeChanges(staged);
		const output = await this.#git(["commit", "-m", message], signal);
		return textResult(`${output.trimEnd()}\n\nCommit message:\n${message}`, { message, files: staged.length });
	}

	async #git(args: string[], signal?: AbortSignal): Promise<string> {
		const timeoutSec = clampTimeout("git", undefined, this.session.settings.get("tools.commandTimeoutSeconds"));
		let result: ProcessResult;
		try {
			result = await runProcess("git", args, { cwd: this.session.cwd, timeoutMs: timeoutSec * 1000, signal });
		} catch (err) {
			if (isEnoent(err)) throw new ToolError("git is not installed");
			throw err;
		}
		const command = `git ${args[0] ?? ""}`;
		if (result.timedOut) throw new ToolError(`${command} timed out after ${timeoutSec} seconds`);
		if (result.cancelled) throw new ToolError(`${command} aborted`);
		if (result.exitCode !== 0) {
			throw new ToolError(
				`${formatProcessOutput(result)}\n\n${command} exited with code ${result.exitCode ?? "unknown"}`,
			);
		}
		return result.stdout;
	}
}
