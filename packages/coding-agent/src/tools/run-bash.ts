import type { AgentTool, AgentToolResult } from "@finch/agent";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { executeBash, formatProcessOutput } from "../exec/bash-executor";
import type { ShellRunResult } from "../shell/shell-manager";
import { ToolError } from "./tool-errors";
import { textResult } from "./tool-result";
import { clampTimeout } from "./tool-timeouts";

const runBashSchema = Type.Object({
	command: Type.String({ description: "Bash command to run" }),
	session_id: Type.Optional(
		Type.String({
			description:
				"Run inside a persistent shell with this id; cd, exported variables and activated environments carry over to later calls with the same id",
		}),
	),
	timeout: Type.Optional(Type.Number({ description: "Timeout in seconds" })),
	env: Type.Optional(
		Type.Record(Type.String(), Type.String(), {
			description: "Variables to export first (persistent sessions keep them)",
		}),
	),
});

type RunBashParams = Static<typeof runBashSchema>;

export interface RunBashDetails {
	exitCode: number | null;
	timedOut: boolean;
	sessionId?: string;
	cwd?: string;
}

export class RunBashTool implements AgentTool<typeof runBashSchema, RunBashDetails> {
	readonly name = "run_bash";
	readonly label = "Bash";
	readonly description =
		"Run a bash command. Without session_id it runs in a fresh shell in the working directory. Non-zero exit codes are reported as failures with the output.";
	readonly parameters = runBashSchema;
	readonly dangerous = true;

	constructor(private readonly session: ToolSession) {}

	describeCall(args: RunBashParams): string {
		return args.session_id ? `[shell ${args.session_id}] $ ${args.command}` : `$ ${args.command}`;
	}

	async execute(
		_toolCallId: string,
		params: RunBashParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<RunBashDetails>> {
		if (params.session_id) {
			const timeoutSec = clampTimeout(
				"run_bash",
				params.timeout,
				this.session.settings.get("shell.defaultTimeoutSeconds"),
			);
			const result = await this.session.shells.execute(params.session_id, params.command, {
				timeoutMs: timeoutSec * 1000,
				env: params.env,
			});
			return sessionResult(result, timeoutSec);
		}

		const timeoutSec = clampTimeout("run_bash", params.timeout, this.session.settings.get("tools.commandTimeoutSeconds"));
		const result = await executeBash(params.command, {
			cwd: this.session.cwd,
			timeoutMs: timeoutSec * 1000,
			env: params.env,
			signal,
		});
		const output = formatProcessOutput(result);
		if (result.cancelled) throw new ToolError(`${output}\n\nCommand aborted`);
		if (result.timedOut) throw new ToolError(`${output}\n\nCommand timed out after ${timeoutSec} seconds`);
		if (result.exitCode !== 0) {
			throw new ToolError(`${output}\n\nCommand exited with code ${result.exitCode ?? "unknown"}`);
		}
		return textResult(output, { exitCode: result.exitCode, timedOut: false });
	}
}

function sessionResult(result: ShellRunResult, timeoutSec: number): AgentToolResult<RunBashDetails> {
	const output = formatProcessOutput(result);
	if (result.timedOut) {
		throw new ToolError(
			`${output}\n\nCommand timed out after ${timeoutSec} seconds; shell ${result.sessionId} is still running it and stays available.`,
		);
	}
	if (result.exitCode !== 0) {
		throw new ToolError(`${output}\n\nCommand exited with code ${result.exitCode ?? "unknown"} (cwd: ${result.cwd})`);
	}
	return textResult(`${output}\n\n[shell ${result.sessionId}, cwd: ${result.cwd}]`, {
		exitCode: result.exitCode,
		timedOut: false,
		sessionId: result.sessionId,
		cwd: result.cwd,
	});
}
