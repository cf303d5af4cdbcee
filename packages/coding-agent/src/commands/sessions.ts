/**
 * Inspect and remove saved sessions.
 */
import { Command } from "commander";
import { runAction } from "../cli/errors";
import { type SessionsCommandArgs, runSessionsCommand } from "../cli/sessions-cli";
import { ConsolePrompter } from "../modes/console-prompter";
import { SessionStore } from "../session/session-store";

async function run(cmd: SessionsCommandArgs): Promise<void> {
	const store = new SessionStore();
	const print = (text: string) => process.stdout.write(`${text}\n`);
	const interactive = !cmd.force && (cmd.action === "delete" || cmd.action === "clear") && process.stdin.isTTY;
	const prompter = interactive ? new ConsolePrompter() : undefined;
	try {
		await runSessionsCommand(cmd, { store, print, prompter });
	} finally {
		prompter?.close();
	}
}

export function createSessionsCommand(): Command {
	const sessions = new Command("sessions").description("List, show and delete saved sessions");
	sessions
		.command("list", { isDefault: true })
		.description("List sessions, most recent first (* marks the current one)")
		.action(() => runAction("list sessions", () => run({ action: "list" })));
	sessions
		.command("show <id>")
		.description("Print a session's metadata and messages")
		.action((id: string) => runAction("show session", () => run({ action: "show", id })));
	sessions
		.command("delete <id>")
		.description("Delete one session")
		.option("-f, --force", "Don't ask for confirmation")
		.action((id: string, options: { force?: boolean }) =>
			runAction("delete session", () => run({ action: "delete", id, force: options.force })),
		);
	sessions
		.command("clear")
		.description("Delete every session")
		.option("-f, --force", "Don't ask for confirmation")
		.action((options: { force?: boolean }) =>
			runAction("clear sessions", () => run({ action: "clear", force: options.force })),
		);
	return sessions;
}
