/**
 * Sessions CLI command handlers: `finch sessions list | show | delete | clear`.
 */
import { getText, getToolCalls, type Message } from "@finch/ai";
import chalk from "chalk";
import type { Prompter } from "../modes/types";
import { type SessionRecord, type SessionStore, type SessionSummary, SessionNotFoundError } from "../session/session-store";
import { CommandError } from "./errors";

export type SessionsAction = "list" | "show" | "delete" | "clear";

export interface SessionsCommandArgs {
	action: SessionsAction;
	id?: string;
	force?: boolean;
}

export interface SessionsCommandContext {
	store: SessionStore;
	print: (text: string) => void;
	/** Asks before deleting unless `force` is set; without one, deletes need `--force`. */
	prompter?: Prompter;
}

const YES = new Set(["y", "yes"]);

function formatTimestamp(iso: string): string {
	return iso.slice(0, 16).replace("T", " ");
}

function formatCount(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatSessionRow(summary: SessionSummary, current: boolean): string {
	const marker = current ? chalk.green("*") : " ";
	const preview = summary.preview || chalk.dim("(no prompts yet)");
	return `${marker} ${chalk.cyan(summary.id)}  ${formatTimestamp(summary.updatedAt)}  ${formatCount(summary.messageCount, "message")}  ${preview}`;
}

function formatMessage(message: Message): string[] {
	switch (message.role) {
		case "user":
			if (message.pinned) {
				return [chalk.dim(`context: ${formatCount(message.content.split("\n").length, "line")}`)];
			}
			return [`${chalk.green("you:")} ${message.content}`];
		case "assistant": {
			const lines: string[] = [];
			const text = getText(message).trim();
			if (text) lines.push(`${chalk.cyan("assistant:")} ${text}`);
			for (const call of getToolCalls(message)) {
				lines.push(chalk.dim(`  → ${call.name} ${JSON.stringify(call.arguments)}`));
			}
			if (message.errorMessage) lines.push(chalk.red(`  error: ${message.errorMessage}`));
			return lines;
		}
		case "toolResult": {
			const firstLine = getText(message).split("\n")[0] ?? "";
			const mark = message.isError ? chalk.red("✗") : chalk.green("✓");
			return [chalk.dim(`  ${mark} ${message.toolName}: ${firstLine}`)];
		}
	}
}

export function formatSessionRecord(record: SessionRecord): string {
	const { metadata } = record;
	const lines = [
		chalk.bold(`Session ${record.id}`),
		`Created:   ${formatTimestamp(record.createdAt)}`,
		`Updated:   ${formatTimestamp(record.updatedAt)}`,
	];
	if (metadata.model) lines.push(`Model:     ${metadata.model}`);
	if (metadata.cwd) lines.push(`Directory: ${metadata.cwd}`);
	lines.push(`Mode:      ${metadata.multiAgent ? "multi-agent" : "single-agent"}`, "");
	if (record.messages.length === 0) lines.push(chalk.dim("(no messages)"));
	for (const message of record.messages) lines.push(...formatMessage(message));
	return lines.join("\n");
}

async function confirmDeletion(ctx: SessionsCommandContext, action: string, question: string): Promise<boolean> {
	if (!ctx.prompter) throw new CommandError(action, "confirmation needs a terminal; pass --force");
	const answer = await ctx.prompter.ask(question);
	return answer !== undefined && YES.has(answer.trim().toLowerCase());
}

function requireId(action: string, id: string | undefined): string {
	if (!id) throw new CommandError(action, "missing session id");
	return id;
}

export async function runSessionsCommand(cmd: SessionsCommandArgs, ctx: SessionsCommandContext): Promise<void> {
	const { store, print } = ctx;
	switch (cmd.action) {
		case "list": {
			const summaries = await store.list();
			if (summaries.length === 0) {
				print("No sessions yet.");
				return;
			}
			const current = await store.getCurrent();
			for (const summary of summaries) print(formatSessionRow(summary, summary.id === current));
			return;
		}
		case "show": {
			const id = requireId("show session", cmd.id);
			try {
				print(formatSessionRecord(await store.load(id)));
			} catch (err) {
				if (err instanceof SessionNotFoundError) throw new CommandError("show session", err.message, { cause: err });
				throw err;
			}
			return;
		}
		case "delete": {
			const id = requireId("delete session", cmd.id);
			if (!(await store.exists(id))) throw new CommandError("delete session", `Session not found: ${id}`);
			if (!cmd.force && !(await confirmDeletion(ctx, "delete session", `Delete session ${id}? [y/N] `))) {
				print("Cancelled.");
				return;
			}
			await store.delete(id);
			print(`${chalk.green("✓")} Deleted session ${id}`);
			return;
		}
		case "clear": {
			const count = (await store.list()).length;
			if (count === 0) {
				print("No sessions to delete.");
				return;
			}
			const question = `Delete all ${formatCount(count, "session")}? [y/N] `;
			if (!cmd.force && !(await confirmDeletion(ctx, "clear sessions", question))) {
				print("Cancelled.");
				return;
			}
			const removed = await store.clear();
			print(`${chalk.green("✓")} Deleted ${formatCount(removed, "session")}`);
			return;
		}
	}
}
