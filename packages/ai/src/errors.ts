/**
 * Tool arguments did not satisfy the tool's schema; the call is never executed.
 */
export class ValidationError extends Error {
	constructor(
		message: string,
		readonly toolName: string,
		readonly issues: string[] = [],
	) {
		super(message);
		this.name = "ValidationError";
	}
}

/**
 * The model endpoint could not produce a reply, after retries where the failure was transient.
 */
export class EndpointError extends Error {
	readonly attempts: number;
	readonly status?: number;

	constructor(message: string, options: { attempts: number; status?: number; cause?: unknown }) {
		super(message, { cause: options.cause });
		this.name = "EndpointError";
		this.attempts = options.attempts;
		this.status = options.status;
	}
}
