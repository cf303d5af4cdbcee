import { type ConfirmationGate, type ConfirmationRequest, createPromptConfirmationGate } from "@finch/agent";
import chalk from "chalk";
import type { Prompter } from "./types";

export function renderConfirmationRequest(request: ConfirmationRequest): string {
	const preview = request.preview
		.split("\n")
		.map(line => `    ${line}`)
		.join("\n");
	return [chalk.yellow.bold(`⚠ ${request.label} (${request.toolName}) wants to run:`), chalk.white(preview)].join("\n");
}

/** Per-call approval at the terminal. Only `y`/`yes` approve. */
export function createConsoleConfirmation(prompter: Prompter): ConfirmationGate {
	return createPromptConfirmationGate((request, signal) => {
		prompter.print(renderConfirmationRequest(request));
		return prompter.ask(chalk.yellow("Allow? [y/N] "), signal);
	});
}
