/**
 * Capability table: every agent role, what it is for and which tools it gets.
 *
 * Only the orchestrator holds delegate_task. Specialist registries are carved out of
 * the full catalog, so a specialist that asks for delegate_task is told the tool is
 * not available to it.
 */
export type Capability =
	| "code_writing"
	| "code_analysis"
	| "file_operations"
	| "shell_execution"
	| "research"
	| "testing"
	| "bioinformatics"
	| "planning";

export interface AgentDefinition {
	id: string;
	role: string;
	capabilities: readonly Capability[];
	tools: readonly string[];
	/** Prompt template under src/prompts. */
	prompt: string;
}

export const AGENTS = {
	coding: {
		id: "coding",
		role: "Coding specialist: implements features, fixes bugs, refactors",
		capabilities: ["code_writing", "code_analysis", "file_operations"],
		tools: [
			"read_file",
			"list_files",
			"search_code",
			"edit_file",
			"run_bash",
			"run_python",
			"manage_shell_session",
			"create_venv",
			"install_deps",
			"git",
			"smart_commit",
			"propose_plan",
		],
		prompt: "agents/coding",
	},
	research: {
		id: "research",
		role: "Research specialist: analyzes code structure, conventions and dependencies",
		capabilities: ["research", "code_analysis"],
		tools: ["read_file", "list_files", "search_code"],
		prompt: "agents/research",
	},
	testing: {
		id: "testing",
		role: "Testing specialist: writes and runs tests, reports failures",
		capabilities: ["testing", "code_analysis", "shell_execution"],
		tools: ["read_file", "list_files", "search_code", "edit_file", "run_bash", "run_python", "manage_shell_session"],
		prompt: "agents/testing",
	},
	bioinformatics: {
		id: "bioinformatics",
		role: "Bioinformatics specialist: sequence, pathway and database analysis",
		capabilities: ["bioinformatics", "research", "file_operations"],
		tools: ["read_file", "list_files", "edit_file", "run_python", "run_bash", "sqlite_query"],
		prompt: "agents/bioinformatics",
	},
	orchestrator: {
		id: "orchestrator",
		role: "Orchestrator: plans the work and delegates it to specialists",
		capabilities: ["planning"],
		tools: ["propose_plan", "delegate_task"],
		prompt: "agents/orchestrator",
	},
} as const satisfies Record<string, AgentDefinition>;

export type AgentId = keyof typeof AGENTS;
export type SpecialistId = Exclude<AgentId, "orchestrator">;

export const SPECIALIST_IDS: readonly SpecialistId[] = ["coding", "research", "testing", "bioinformatics"];

export function isAgentId(value: string): value is AgentId {
	return Object.hasOwn(AGENTS, value);
}

export function isSpecialistId(value: string): value is SpecialistId {
	return isAgentId(value) && value !== "orchestrator";
}
