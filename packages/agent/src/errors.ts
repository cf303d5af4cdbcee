import { EndpointError, ValidationError } from "@finch/ai";

export { EndpointError, ValidationError };

/** The model asked for a tool no registry in this process knows. */
export class ToolNotFoundError extends ValidationError {
	constructor(toolName: string) {
		super(`Unknown tool: ${toolName}`, toolName);
		this.name = "ToolNotFoundError";
	}
}

/** The tool exists in the catalog but was left out of this agent's registry. */
export class ToolNotAllowedError extends ValidationError {
	constructor(toolName: string, reason = "is not available to this agent") {
		super(`Tool ${toolName} ${reason}`, toolName);
		this.name = "ToolNotAllowedError";
	}
}

export class DuplicateToolError extends Error {
	constructor(readonly toolName: string) {
		super(`Tool already registered: ${toolName}`);
		this.name = "DuplicateToolError";
	}
}

export class RegistryFrozenError extends Error {
	constructor(readonly toolName: string) {
		super(`Cannot register ${toolName}: registry is frozen`);
		this.name = "RegistryFrozenError";
	}
}

/** A tool handler threw; the failure is returned to the model and the turn goes on. */
export class ExecutionError extends Error {
	constructor(
		readonly toolName: string,
		cause: unknown,
	) {
		super(cause instanceof Error ? cause.message : String(cause), { cause });
		this.name = "ExecutionError";
	}
}

/** The user refused a dangerous call; only that call is skipped. */
export class ConfirmationDeclinedError extends Error {
	constructor(readonly toolName: string) {
		super("User cancelled execution");
		this.name = "ConfirmationDeclinedError";
	}
}

export class IterationCapExceededError extends Error {
	constructor(readonly maxIterations: number) {
		super(`Stopped after ${maxIterations} model calls without a final answer`);
		this.name = "IterationCapExceededError";
	}
}

export class AgentBusyError extends Error {
	constructor(message = "Agent is already processing a turn; wait for it to finish.") {
		super(message);
		this.name = "AgentBusyError";
	}
}
