import { logger, toError } from "@finch/utils";
import chalk from "chalk";

/** A command failure shown to the user as `Error: <action>: <reason>`. */
export class CommandError extends Error {
	constructor(
		readonly action: string,
		readonly reason: string,
		options?: { cause?: unknown },
	) {
		super(`${action}: ${reason}`, options);
		this.name = "CommandError";
	}
}

export function formatCommandError(action: string, err: unknown): string {
	if (err instanceof CommandError) return `Error: ${err.action}: ${err.reason}`;
	return `Error: ${action}: ${toError(err).message}`;
}

/**
 * Run a command body; a failure is printed to stderr and sets a non-zero exit code
 * instead of escaping as an unhandled rejection.
 */
export async function runAction(action: string, fn: () => Promise<void>): Promise<void> {
	try {
		await fn();
	} catch (err) {
		logger.error("Command failed", { action, error: toError(err).message });
		process.stderr.write(`${chalk.red(formatCommandError(action, err))}\n`);
		process.exitCode = 1;
	}
}
