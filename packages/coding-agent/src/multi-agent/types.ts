export interface AgentTask {
	/** Target agent id from the capability table. */
	agent: string;
	description: string;
	context: Record<string, unknown>;
}

export interface AgentResult {
	agent: string;
	task: string;
	/** The specialist reached a final answer without an endpoint failure or hitting its cap. */
	success: boolean;
	/** Final answer text. */
	outputs: string;
	/** Files changed through edit_file, in first-touched order. */
	modifiedResources: string[];
	issues: string[];
	suggestions: string[];
	/** Tool calls the specialist made. */
	toolCalls: number;
}

/** What the delegate_task tool talks to. */
export interface DelegationTarget {
	delegate(task: AgentTask, signal?: AbortSignal): Promise<AgentResult>;
}
