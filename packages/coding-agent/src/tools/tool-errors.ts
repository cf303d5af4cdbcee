/**
 * Error types for tool execution.
 *
 * Tools throw these instead of returning error text; the agent loop turns any thrown
 * error into a failed tool result the model can react to.
 */

/** A failure the model should read as-is, e.g. "File not found: src/a.ts". */
export class ToolError extends Error {
	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ToolError";
	}
}

/**
 * Error thrown when a tool operation is aborted (e.g., via AbortSignal).
 */
export class ToolAbortError extends Error {
	static readonly MESSAGE = "Operation aborted";

	constructor(message: string = ToolAbortError.MESSAGE) {
		super(message);
		this.name = "ToolAbortError";
	}
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		const reason = signal.reason instanceof Error ? signal.reason : undefined;
		throw reason instanceof ToolAbortError ? reason : new ToolAbortError();
	}
}

/** Message text for any thrown value. */
export function renderError(e: unknown): string {
	if (e instanceof Error) {
		return e.message;
	}
	return String(e);
}
