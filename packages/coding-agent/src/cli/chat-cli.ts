/**
 * `finch chat`: check the endpoint, open (or resume) a session and run the REPL.
 */
import { listEndpointModels } from "@finch/ai";
import { loadEnvFiles, toError } from "@finch/utils";
import chalk from "chalk";
import { Settings } from "../config/settings";
import { createConsoleConfirmation } from "../modes/confirmation";
import { ConsolePrompter } from "../modes/console-prompter";
import { formatAgentEvent } from "../modes/event-renderer";
import { InteractiveMode } from "../modes/interactive-mode";
import type { Prompter } from "../modes/types";
import { createAgentSession } from "../sdk";
import { SessionNotFoundError } from "../session/session-store";
import { CommandError } from "./errors";

export interface ChatCommandArgs {
	host?: string;
	model?: string;
	/** Start a new session instead of resuming the current one. */
	new?: boolean;
	resume?: string;
	multiAgent?: boolean;
}

/** Ollama lists tagged names (`llama3.2:latest`); a bare name matches any tag. */
export function modelIsListed(available: readonly string[], name: string): boolean {
	return available.some(id => id === name || id.startsWith(`${name}:`));
}

/**
 * Let the user pick one of `available` by number. Resolves `undefined` on EOF or
 * interrupt; anything else re-asks.
 */
export async function selectModel(available: readonly string[], prompter: Prompter): Promise<string | undefined> {
	prompter.print(chalk.bold("Available models:"));
	prompter.print(available.map((id, i) => `  ${chalk.cyan(`${i + 1}.`)} ${id}`).join("\n"));
	for (;;) {
		const answer = await prompter.ask("Select model number: ");
		if (answer === undefined) return undefined;
		const choice = Number(answer.trim());
		const picked = Number.isInteger(choice) ? available[choice - 1] : undefined;
		if (picked !== undefined) return picked;
		prompter.print(chalk.red(`Please enter a number between 1 and ${available.length}`));
	}
}

/**
 * Settle the model against what the endpoint lists. With no model configured
 * anywhere the user picks one and it is saved to config.yml; a configured model
 * the endpoint does not list only warns.
 */
export async function resolveModel(settings: Settings, available: readonly string[], prompter: Prompter): Promise<void> {
	const host = settings.get("model.host");
	const name = settings.get("model.name");
	if (settings.source("model.name") === "default") {
		if (available.length === 0) {
			prompter.print(chalk.yellow(`Warning: ${host} lists no models. Pull one first (ollama pull <model>).`));
			return;
		}
		prompter.print(chalk.dim(`Connected to ${host}`));
		const picked = await selectModel(available, prompter);
		if (picked !== undefined) {
			settings.set("model.name", picked);
			return;
		}
	}
	if (!modelIsListed(available, name)) {
		prompter.print(chalk.yellow(`Warning: ${host} does not list model "${name}". Pull it first (ollama pull ${name}).`));
	}
}

async function checkEndpoint(settings: Settings, prompter: Prompter): Promise<void> {
	const host = settings.get("model.host");
	let available: string[];
	try {
		available = await listEndpointModels(host, settings.get("model.apiKey"));
	} catch (err) {
		throw new CommandError("connect to model endpoint", `${host} is not reachable (${toError(err).message})`, {
			cause: err,
		});
	}
	await resolveModel(settings, available, prompter);
}

export async function runChatCommand(cmd: ChatCommandArgs): Promise<void> {
	const cwd = process.cwd();
	loadEnvFiles(cwd);
	const settings = await Settings.init({ overrides: { "model.host": cmd.host, "model.name": cmd.model } });
	const prompter = new ConsolePrompter();
	const print = (text: string) => prompter.print(text);

	try {
		await checkEndpoint(settings, prompter);
		let runtime: Awaited<ReturnType<typeof createAgentSession>>;
		try {
			runtime = await createAgentSession({
				settings,
				cwd,
				prompter,
				confirmation: createConsoleConfirmation(prompter),
				multiAgent: cmd.multiAgent ? true : undefined,
				resumeId: cmd.resume,
				forceNew: cmd.new,
				onSpecialistEvent: (agent, event) => {
					const line = formatAgentEvent(event, agent);
					if (line !== undefined) print(line);
				},
				onStorageError: error => print(chalk.yellow(`Warning: save session: ${error.message}`)),
			});
		} catch (err) {
			if (err instanceof SessionNotFoundError) throw new CommandError("resume session", err.message, { cause: err });
			throw err;
		}

		try {
			await new InteractiveMode({ runtime, prompter }).run();
		} finally {
			await runtime.dispose();
		}
		if (runtime.session.sessionId) print(chalk.dim(`Session saved as ${runtime.session.sessionId}`));
	} finally {
		prompter.close();
		await settings.flush();
	}
}
