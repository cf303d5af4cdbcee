import { type AgentTool, ToolRegistry } from "@finch/agent";
import type { Settings } from "../config/settings";
import type { Prompter } from "../modes/types";
import type { DelegationTarget } from "../multi-agent/types";
import type { ShellSessionManager } from "../shell/shell-manager";
import { DelegateTaskTool } from "./delegate-task";
import { EditFileTool } from "./edit-file";
import { GitTool } from "./git";
import { ListFilesTool } from "./list-files";
import { ManageShellSessionTool } from "./manage-shell-session";
import { ProposePlanTool } from "./propose-plan";
import { CreateVenvTool, InstallDepsTool } from "./python-env";
import { ReadFileTool } from "./read-file";
import { RunBashTool } from "./run-bash";
import { RunPythonTool } from "./run-python";
import { SearchCodeTool } from "./search-code";
import { SmartCommitTool } from "./smart-commit";
import { SqliteQueryTool } from "./sqlite-query";

export * from "./delegate-task";
export * from "./edit-file";
export * from "./git";
export * from "./list-files";
export * from "./manage-shell-session";
export * from "./path-utils";
export * from "./propose-plan";
export * from "./python-env";
export * from "./read-file";
export * from "./run-bash";
export * from "./run-python";
export * from "./search-code";
export * from "./smart-commit";
export * from "./sqlite-query";
export * from "./tool-errors";
export * from "./tool-result";
export * from "./tool-timeouts";

/** Session context for tool factories */
export interface ToolSession {
	/** Current working directory */
	cwd: string;
	settings: Settings;
	/** Persistent shells shared by run_bash and manage_shell_session */
	shells: ShellSessionManager;
	/** Attached in interactive mode; plans need someone to pick steps. */
	prompter?: Prompter;
	/** Attached in multi-agent mode once the coordinator exists. */
	delegation?: DelegationTarget;
}

type ToolFactory = (session: ToolSession) => AgentTool;

export const BUILTIN_TOOLS = {
	read_file: s => new ReadFileTool(s),
	list_files: s => new ListFilesTool(s),
	search_code: s => new SearchCodeTool(s),
	edit_file: s => new EditFileTool(s),
	run_bash: s => new RunBashTool(s),
	manage_shell_session: s => new ManageShellSessionTool(s),
	run_python: s => new RunPythonTool(s),
	create_venv: s => new CreateVenvTool(s),
	install_deps: s => new InstallDepsTool(s),
	sqlite_query: s => new SqliteQueryTool(s),
	git: s => new GitTool(s),
	smart_commit: s => new SmartCommitTool(s),
	propose_plan: s => new ProposePlanTool(s),
	delegate_task: s => new DelegateTaskTool(s),
} satisfies Record<string, ToolFactory>;

export type ToolName = keyof typeof BUILTIN_TOOLS;

/** Tools the single-agent mode runs with: everything but delegation. */
export const SINGLE_AGENT_EXCLUDED: readonly ToolName[] = ["delegate_task"];

export function createTools(session: ToolSession): AgentTool[] {
	return Object.values(BUILTIN_TOOLS).map(factory => factory(session));
}

/**
 * The full, frozen tool catalog. Role registries are derived from it with
 * `subset`/`without`, so every left-out tool is reported as not allowed.
 */
export function createToolCatalog(session: ToolSession): ToolRegistry {
	return new ToolRegistry(createTools(session)).freeze();
}
