import type { AgentTool, AgentToolResult } from "@finch/agent";
import { StringEnum } from "@finch/ai";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { type ProcessResult, formatProcessOutput, runProcess } from "../exec/bash-executor";
import { ToolError } from "./tool-errors";
import { textResult } from "./tool-result";
import { clampTimeout } from "./tool-timeouts";

const GIT_ACTIONS = [
	"status",
	"log",
	"diff",
	"branch",
	"remote",
	"add",
	"commit",
	"checkout",
	"switch",
	"stash",
	"pull",
	"push",
	"merge",
	"reset",
	"restore",
	"init",
] as const;

type GitAction = (typeof GIT_ACTIONS)[number];

const READ_ONLY_ACTIONS: ReadonlySet<string> = new Set<GitAction>(["status", "log", "diff", "branch", "remote"]);

const DEFAULT_ARGS: Partial<Record<GitAction, string[]>> = {
	log: ["--oneline", "-n", "20"],
	status: ["--short", "--branch"],
	remote: ["-v"],
};

const gitSchema = Type.Object({
	action: StringEnum(GIT_ACTIONS, { description: "Git subcommand" }),
	args: Type.Optional(Type.Array(Type.String(), { description: "Extra arguments, e.g. ['--stat'] or ['src/a.ts']" })),
	message: Type.Optional(Type.String({ description: "Commit message (commit only)" })),
});

type GitParams = Static<typeof gitSchema>;

export interface GitDetails {
	action: GitAction;
	exitCode: number | null;
}

export function isReadOnlyGitAction(action: string): boolean {
	return READ_ONLY_ACTIONS.has(action);
}

function buildArgs(params: GitParams): string[] {
	const args = params.args && params.args.length > 0 ? params.args : (DEFAULT_ARGS[params.action] ?? []);
	if (params.action === "commit" && params.message !== undefined) {
		return ["commit", "-m", params.message, ...args];
	}
	return [params.action, ...args];
}

export class GitTool implements AgentTool<typeof gitSchema, GitDetails> {
	readonly name = "git";
	readonly label = "Git";
	readonly description =
		"Run a git subcommand in the working directory. status, log, diff, branch and remote run directly; everything else needs user approval.";
	readonly parameters = gitSchema;

	constructor(private readonly session: ToolSession) {}

	requiresConfirmation(args: GitParams): boolean {
		return !isReadOnlyGitAction(args.action);
	}

	describeCall(args: GitParams): string {
		return `git ${buildArgs(args)
			.map(arg => (/\s/.test(arg) ? JSON.stringify(arg) : arg))
			.join(" ")}`;
	}

	async execute(
		_toolCallId: string,
		params: GitParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<GitDetails>> {
		if (params.action === "commit" && params.message === undefined && !params.args?.length) {
			throw new ToolError("commit needs a message");
		}
		const timeoutSec = clampTimeout("git", undefined, this.session.settings.get("tools.commandTimeoutSeconds"));
		let result: ProcessResult;
		try {
			result = await runProcess("git", buildArgs(params), {
				cwd: this.session.cwd,
				timeoutMs: timeoutSec * 1000,
				signal,
			});
		} catch (err) {
			if (isEnoent(err)) throw new ToolError("git is not installed");
			throw err;
		}
		const output = formatProcessOutput(result);
		if (result.timedOut) throw new ToolError(`${output}\n\ngit ${params.action} timed out after ${timeoutSec} seconds`);
		if (result.exitCode !== 0) {
			throw new ToolError(`${output}\n\ngit ${params.action} exited with code ${result.exitCode ?? "unknown"}`);
		}
		return textResult(output, { action: params.action, exitCode: result.exitCode });
	}
}
