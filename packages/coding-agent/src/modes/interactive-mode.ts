/**
 * Line-based REPL for a chat session.
 * Reads a line, runs it as one agent turn, prints tool activity and the answer.
 */
import { AgentBusyError } from "@finch/agent";
import { APP_NAME, VERSION, logger } from "@finch/utils";
import chalk from "chalk";
import type { CreateAgentSessionResult } from "../sdk";
import type { ConsolePrompter } from "./console-prompter";
import { formatAgentEvent } from "./event-renderer";

const EXIT_COMMANDS = new Set(["/exit", "/quit"]);

const HELP_TEXT = [
	"/exit, /quit   leave (Ctrl+D works too)",
	"/session       show the session id",
	"/help          show this help",
	"Ctrl+C         stop the running turn; at an empty prompt, leave",
].join("\n");

export interface InteractiveModeOptions {
	runtime: CreateAgentSessionResult;
	prompter: ConsolePrompter;
}

export function renderBanner(runtime: CreateAgentSessionResult): string {
	const mode = runtime.multiAgent ? "multi-agent" : "single-agent";
	const sessionId = runtime.session.sessionId;
	const session = sessionId
		? `${runtime.resumed ? "resumed" : "new"} session ${sessionId}`
		: chalk.yellow("unsaved session");
	return [
		chalk.bold.cyan(`${APP_NAME} ${VERSION}`),
		chalk.dim(`model ${runtime.model.id} at ${runtime.model.baseUrl} · ${mode} · ${session}`),
		chalk.dim('Type "/help" for commands.'),
	].join("\n");
}

export class InteractiveMode {
	readonly #runtime: CreateAgentSessionResult;
	readonly #prompter: ConsolePrompter;
	readonly #unsubscribers: (() => void)[] = [];

	constructor(options: InteractiveModeOptions) {
		this.#runtime = options.runtime;
		this.#prompter = options.prompter;
	}

	/** Resolves when the user leaves. */
	async run(): Promise<void> {
		const { agent } = this.#runtime;
		this.#prompter.print(renderBanner(this.#runtime));
		this.#unsubscribers.push(
			agent.subscribe(event => {
				const line = formatAgentEvent(event);
				if (line !== undefined) this.#prompter.print(line);
			}),
		);
		this.#prompter.onInterrupt(() => {
			if (agent.state.isRunning) {
				this.#prompter.print(chalk.yellow("\nStopping..."));
				agent.abort();
			}
		});

		try {
			while (true) {
				const line = await this.#prompter.ask(chalk.green("> "));
				if (line === undefined) break;
				const input = line.trim();
				if (!input) continue;
				if (EXIT_COMMANDS.has(input)) break;
				if (input === "/help") {
					this.#prompter.print(HELP_TEXT);
					continue;
				}
				if (input === "/session") {
					this.#prompter.print(this.#runtime.session.sessionId ?? "(unsaved)");
					continue;
				}
				await this.#runTurn(input);
			}
		} finally {
			this.#prompter.onInterrupt(undefined);
			for (const unsubscribe of this.#unsubscribers) unsubscribe();
		}
	}

	async #runTurn(input: string): Promise<void> {
		try {
			await this.#runtime.session.prompt(input);
		} catch (err) {
			if (err instanceof AgentBusyError) {
				this.#prompter.print(chalk.yellow(err.message));
				return;
			}
			throw err;
		}
		logger.debug("Turn finished", { sessionId: this.#runtime.session.sessionId });
	}
}
