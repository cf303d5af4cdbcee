import * as fs from "node:fs";
import * as path from "node:path";
import type { AgentTool, AgentToolResult } from "@finch/agent";
import { isEnoent } from "@finch/utils";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { type ProcessResult, formatProcessOutput, runProcess } from "../exec/bash-executor";
import { displayPath, resolveToCwd } from "./path-utils";
import { ToolError } from "./tool-errors";
import { textResult } from "./tool-result";
import { clampTimeout } from "./tool-timeouts";

export const VENV_DIR = ".venv";

const projectSchema = Type.Object({
	path: Type.Optional(Type.String({ description: "Project directory (default: working directory)" })),
	timeout: Type.Optional(Type.Number({ description: "Timeout in seconds" })),
});

type ProjectParams = Static<typeof projectSchema>;

export interface CreateVenvDetails {
	venvPath: string;
	created: boolean;
}

export interface InstallDepsDetails {
	source: "requirements.txt" | "pyproject.toml";
	exitCode: number | null;
}

/** pip inside a virtual environment, POSIX or Windows layout; undefined when neither exists. */
export function findVenvPip(venvPath: string): string | undefined {
	for (const candidate of [path.join(venvPath, "bin", "pip"), path.join(venvPath, "Scripts", "pip.exe")]) {
		if (fs.existsSync(candidate)) return candidate;
	}
	return undefined;
}

function resolveProject(session: ToolSession, params: ProjectParams): string {
	const projectPath = resolveToCwd(params.path ?? ".", session.cwd);
	if (!fs.statSync(projectPath, { throwIfNoEntry: false })?.isDirectory()) {
		throw new ToolError(`Project directory not found: ${displayPath(projectPath, session.cwd)}`);
	}
	return projectPath;
}

function checkResult(result: ProcessResult, what: string, timeoutSec: number): string {
	const output = formatProcessOutput(result);
	if (result.timedOut) throw new ToolError(`${output}\n\n${what} timed out after ${timeoutSec} seconds`);
	if (result.cancelled) throw new ToolError(`${output}\n\n${what} aborted`);
	if (result.exitCode !== 0) {
		throw new ToolError(`${output}\n\n${what} exited with code ${result.exitCode ?? "unknown"}`);
	}
	return output;
}

export class CreateVenvTool implements AgentTool<typeof projectSchema, CreateVenvDetails> {
	readonly name = "create_venv";
	readonly label = "Create venv";
	readonly description = `Create a Python virtual environment in ${VENV_DIR} of a project directory. An existing one is left as it is.`;
	readonly parameters = projectSchema;

	constructor(private readonly session: ToolSession) {}

	async execute(
		_toolCallId: string,
		params: ProjectParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<CreateVenvDetails>> {
		const projectPath = resolveProject(this.session, params);
		const venvPath = path.join(projectPath, VENV_DIR);
		const shown = displayPath(venvPath, this.session.cwd);
		if (fs.existsSync(venvPath)) {
			return textResult(`Virtual environment already exists: ${shown}`, { venvPath, created: false });
		}

		const interpreter = this.session.settings.get("tools.python");
		const timeoutSec = clampTimeout(
			"create_venv",
			params.timeout,
			this.session.settings.get("tools.commandTimeoutSeconds"),
		);
		let result: ProcessResult;
		try {
			result = await runProcess(interpreter, ["-m", "venv", venvPath], {
				cwd: projectPath,
				timeoutMs: timeoutSec * 1000,
				signal,
			});
		} catch (err) {
			if (isEnoent(err)) throw new ToolError(`Python interpreter not found: ${interpreter}`);
			throw err;
		}
		checkResult(result, "venv", timeoutSec);
		return textResult(`Created virtual environment: ${shown}`, { venvPath, created: true });
	}
}

export class InstallDepsTool implements AgentTool<typeof projectSchema, InstallDepsDetails> {
	readonly name = "install_deps";
	readonly label = "Install deps";
	readonly description = `Install a Python project's dependencies into its ${VENV_DIR} with pip, from requirements.txt or else pyproject.toml. Run create_venv first.`;
	readonly parameters = projectSchema;
	readonly dangerous = true;

	constructor(private readonly session: ToolSession) {}

	describeCall(args: ProjectParams): string {
		const projectPath = resolveToCwd(args.path ?? ".", this.session.cwd);
		return `pip install into ${displayPath(path.join(projectPath, VENV_DIR), this.session.cwd)}`;
	}

	async execute(
		_toolCallId: string,
		params: ProjectParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<InstallDepsDetails>> {
		const projectPath = resolveProject(this.session, params);
		const source = fs.existsSync(path.join(projectPath, "requirements.txt"))
			? "requirements.txt"
			: fs.existsSync(path.join(projectPath, "pyproject.toml"))
				? "pyproject.toml"
				: undefined;
		if (!source) throw new ToolError("No requirements.txt or pyproject.toml found");

		const venvPath = path.join(projectPath, VENV_DIR);
		const pip = findVenvPip(venvPath);
		if (!pip) {
			throw new ToolError(`No virtual environment at ${displayPath(venvPath, this.session.cwd)}; call create_venv first`);
		}

		const args = source === "requirements.txt" ? ["install", "-r", "requirements.txt"] : ["install", "-e", "."];
		const timeoutSec = clampTimeout(
			"install_deps",
			params.timeout,
			this.session.settings.get("tools.commandTimeoutSeconds"),
		);
		const result = await runProcess(pip, args, { cwd: projectPath, timeoutMs: timeoutSec * 1000, signal });
		const output = checkResult(result, "pip install", timeoutSec);
		return textResult(output, { source, exitCode: result.exitCode });
	}
}
