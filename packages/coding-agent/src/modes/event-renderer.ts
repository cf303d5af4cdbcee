import type { AgentEvent } from "@finch/agent";
import { getText } from "@finch/ai";
import chalk from "chalk";

const ARG_PREVIEW_CHARS = 80;
const RESULT_PREVIEW_LINES = 3;

function previewArgs(args: Record<string, unknown>): string {
	const text = JSON.stringify(args);
	return text.length > ARG_PREVIEW_CHARS ? `${text.slice(0, ARG_PREVIEW_CHARS - 3)}...` : text;
}

function previewResult(text: string): string {
	const lines = text.split("\n");
	const shown = lines.slice(0, RESULT_PREVIEW_LINES).map(line => `    ${line}`);
	if (lines.length > RESULT_PREVIEW_LINES) shown.push(`    ... (${lines.length - RESULT_PREVIEW_LINES} more lines)`);
	return shown.join("\n");
}

/**
 * Terminal line(s) for one agent event, or `undefined` for events the console does
 * not show. `source` tags output from a specialist running under the orchestrator.
 */
export function formatAgentEvent(event: AgentEvent, source?: string): string | undefined {
	const tag = source ? chalk.magenta(`[${source}] `) : "";
	switch (event.type) {
		case "tool_execution_start":
			return `${tag}${chalk.cyan("→")} ${chalk.bold(event.toolName)} ${chalk.dim(previewArgs(event.args))}`;
		case "tool_execution_end": {
			const text = event.result.content.map(part => part.text).join("\n");
			if (event.isError) {
				return `${tag}${chalk.red("✗")} ${event.toolName}\n${chalk.red(previewResult(text))}`;
			}
			return `${tag}${chalk.green("✓")} ${event.toolName}\n${chalk.dim(previewResult(text))}`;
		}
		case "model_retry":
			return `${tag}${chalk.yellow(`Model request failed (${event.reason}); retry ${event.attempt} in ${event.delayMs}ms`)}`;
		case "message_end": {
			// Specialist answers are summarized by delegate_task; only show the orchestrator's own.
			if (source || event.message.role !== "assistant") return undefined;
			const text = getText(event.message).trim();
			return text ? `\n${text}\n` : undefined;
		}
		case "agent_end":
			return event.result.error ? `${tag}${chalk.red(`Error: model turn: ${event.result.error.message}`)}` : undefined;
		default:
			return undefined;
	}
}
