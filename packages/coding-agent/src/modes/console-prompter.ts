import * as readline from "node:readline/promises";
import type { Prompter } from "./types";

export interface ConsolePrompterOptions {
	input?: NodeJS.ReadableStream;
	output?: NodeJS.WritableStream;
	/** Treat the streams as a terminal (line editing, Ctrl+C as SIGINT). Defaults to stdin's TTY state. */
	terminal?: boolean;
}

/**
 * Prompter over a readline interface.
 *
 * EOF (Ctrl+D, closed pipe) and Ctrl+C while a question is open both resolve the
 * question with `undefined`. Ctrl+C with no open question goes to the interrupt handler.
 */
export class ConsolePrompter implements Prompter {
	readonly #rl: readline.Interface;
	readonly #output: NodeJS.WritableStream;
	#closed = false;
	#pending?: AbortController;
	#onInterrupt?: () => void;

	constructor(options: ConsolePrompterOptions = {}) {
		const input = options.input ?? process.stdin;
		this.#output = options.output ?? process.stdout;
		this.#rl = readline.createInterface({
			input,
			output: this.#output,
			terminal: options.terminal ?? process.stdin.isTTY === true,
		});
		this.#rl.on("close", () => {
			this.#closed = true;
			this.#pending?.abort();
		});
		this.#rl.on("SIGINT", () => {
			if (this.#pending) {
				this.#output.write("\n");
				this.#pending.abort();
			} else {
				this.#onInterrupt?.();
			}
		});
	}

	get closed(): boolean {
		return this.#closed;
	}

	/** Handler for Ctrl+C while no question is open, e.g. to abort a running turn. */
	onInterrupt(handler: (() => void) | undefined): void {
		this.#onInterrupt = handler;
	}

	async ask(question: string, signal?: AbortSignal): Promise<string | undefined> {
		if (this.#closed || signal?.aborted) return undefined;
		const controller = new AbortController();
		const forward = () => controller.abort();
		signal?.addEventListener("abort", forward, { once: true });
		this.#pending = controller;
		try {
			return await this.#rl.question(question, { signal: controller.signal });
		} catch (err) {
			if (controller.signal.aborted || this.#closed) return undefined;
			throw err;
		} finally {
			this.#pending = undefined;
			signal?.removeEventListener("abort", forward);
		}
	}

	print(text: string): void {
		this.#output.write(`${text}\n`);
	}

	close(): void {
		this.#rl.close();
	}
}
