import { PassThrough, Writable } from "node:stream";
import { Settings } from "@finch/coding-agent/config/settings";
import { ConsolePrompter } from "@finch/coding-agent/modes/console-prompter";
import { InteractiveMode, renderBanner } from "@finch/coding-agent/modes/interactive-mode";
import { type CreateAgentSessionResult, createAgentSession } from "@finch/coding-agent/sdk";
import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { assistantMsg, createTempDir, removeTempDir, scriptedChat } from "../utilities";

/** Streams that type the next scripted line each time a "> " prompt is shown, then end input. */
class ScriptedTerminal {
	readonly input = new PassThrough();
	readonly output: Writable;
	text = "";

	constructor(lines: string[]) {
		const pending = [...lines];
		this.output = new Writable({
			write: (chunk: Buffer | string, _encoding, done) => {
				const text = String(chunk);
				this.text += text;
				if (text.endsWith("> ")) {
					setImmediate(() => {
						const next = pending.shift();
						if (next === undefined) this.input.end();
						else this.input.write(`${next}\n`);
					});
				}
				done();
			},
		});
	}
}

describe("InteractiveMode", () => {
	let dir: string;
	let runtime: CreateAgentSessionResult;

	beforeAll(() => {
		chalk.level = 0;
	});

	beforeEach(async () => {
		dir = createTempDir();
		runtime = await createAgentSession({
			settings: Settings.isolated(),
			cwd: dir,
			chat: scriptedChat([assistantMsg("hello there")]),
			ephemeral: true,
		});
	});

	afterEach(async () => {
		await runtime.dispose();
		removeTempDir(dir);
	});

	it("shows the model, mode and session state in the banner", () => {
		expect(renderBanner(runtime).split("\n")[1]).toBe(
			"model llama3.2 at http://localhost:11434/v1 · single-agent · unsaved session",
		);
	});

	it("runs turns and slash commands until /exit", async () => {
		const terminal = new ScriptedTerminal(["/help", "hi", "/session", "/exit", "never read"]);
		const prompter = new ConsolePrompter({ input: terminal.input, output: terminal.output, terminal: false });

		await new InteractiveMode({ runtime, prompter }).run();
		prompter.close();

		expect(terminal.text).toContain("/exit, /quit   leave (Ctrl+D works too)");
		expect(terminal.text).toContain("\nhello there\n");
		expect(terminal.text).toContain("(unsaved)\n");
		expect(runtime.agent.state.messages.map(m => m.role)).toEqual(["user", "assistant"]);
	});

	it("leaves on end of input", async () => {
		const terminal = new ScriptedTerminal([]);
		const prompter = new ConsolePrompter({ input: terminal.input, output: terminal.output, terminal: false });

		await new InteractiveMode({ runtime, prompter }).run();

		expect(prompter.closed).toBe(true);
		expect(runtime.agent.state.messages).toEqual([]);
	});
});

describe("ConsolePrompter", () => {
	it("answers undefined once the signal has aborted", async () => {
		const terminal = new ScriptedTerminal(["ignored"]);
		const prompter = new ConsolePrompter({ input: terminal.input, output: terminal.output, terminal: false });
		const controller = new AbortController();
		controller.abort();

		expect(await prompter.ask("> ", controller.signal)).toBeUndefined();
		prompter.close();
	});

	it("returns the typed line", async () => {
		const terminal = new ScriptedTerminal(["  spaced answer "]);
		const prompter = new ConsolePrompter({ input: terminal.input, output: terminal.output, terminal: false });

		expect(await prompter.ask("> ")).toBe("  spaced answer ");
		prompter.print("done");
		prompter.close();
		expect(terminal.text).toBe("> done\n");
	});
});
