import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { type ProcessResult, formatProcessOutput, runProcess } from "../exec/bash-executor";
import { ToolError } from "./tool-errors";
import { textResult } from "./tool-result";
import { clampTimeout } from "./tool-timeouts";

const runPythonSchema = Type.Object({
	code: Type.String({ description: "Python source to run" }),
	timeout: Type.Optional(Type.Number({ description: "Timeout in seconds" })),
});

type RunPythonParams = Static<typeof runPythonSchema>;

export interface RunPythonDetails {
	exitCode: number | null;
}

export class RunPythonTool implements AgentTool<typeof runPythonSchema, RunPythonDetails> {
	readonly name = "run_python";
	readonly label = "Python";
	readonly description =
		"Run a Python script in the working directory and return what it prints. Each call is a fresh interpreter.";
	readonly parameters = runPythonSchema;
	readonly dangerous = true;

	constructor(private readonly session: ToolSession) {}

	describeCall(args: RunPythonParams): string {
		return args.code;
	}

	async execute(
		_toolCallId: string,
		params: RunPythonParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<RunPythonDetails>> {
		const interpreter = this.session.settings.get("tools.python");
		const timeoutSec = clampTimeout(
			"run_python",
			params.timeout,
			this.session.settings.get("tools.commandTimeoutSeconds"),
		);
		let result: ProcessResult;
		try {
			result = await runProcess(interpreter, ["-c", params.code], {
				cwd: this.session.cwd,
				timeoutMs: timeoutSec * 1000,
				signal,
			});
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`Python interpreter not found: ${interpreter}`);
			throw err;
		}
		const output = formatProcessOutput(result);
		if (result.timedOut) throw new ToolError(`${output}\n\nScript timed out after ${timeoutSec} seconds`);
		if (result.cancelled) throw new ToolError(`${output}\n\nScript aborted`);
		if (result.exitCode !== 0) {
			throw new ToolError(`${output}\n\nScript exited with code ${result.exitCode ?? "unknown"}`);
		}
		return textResult(output, { exitCode: result.exitCode });
	}
}
