import type { AgentRunResult } from "@finch/agent";
import { type Message, type ToolResultMessage, getText } from "@finch/ai";
import { isRecord } from "@finch/utils";
import type { AgentResult, AgentTask } from "./types";

const MAX_ISSUE_CHARS = 300;

/**
 * Bullet items under a `## <heading>` section of a markdown answer, up to the next heading.
 * Continuation lines are folded into the preceding item.
 */
export function extractSection(text: string, heading: string): string[] {
	const lines = text.split("\n");
	const wanted = heading.toLowerCase();
	const start = lines.findIndex(line => {
		const match = /^#{1,6}\s+(.+?)\s*#*\s*$/.exec(line.trim());
		return match?.[1]?.toLowerCase() === wanted;
	});
	if (start < 0) return [];

	const items: string[] = [];
	for (const raw of lines.slice(start + 1)) {
		const line = raw.trim();
		if (/^#{1,6}\s/.test(line)) break;
		const bullet = /^(?:[-*+]|\d+[.)])\s+(.*)$/.exec(line);
		if (bullet?.[1]) {
			items.push(bullet[1].trim());
		} else if (line && items.length > 0) {
			items[items.length - 1] = `${items[items.length - 1]} ${line}`;
		}
	}
	return items;
}

function clip(text: string): string {
	const flat = text.replace(/\s+/g, " ").trim();
	return flat.length > MAX_ISSUE_CHARS ? `${flat.slice(0, MAX_ISSUE_CHARS - 3)}...` : flat;
}

function editedPath(message: ToolResultMessage): string | undefined {
	if (message.toolName !== "edit_file" || message.isError || !isRecord(message.details)) return undefined;
	return typeof message.details.path === "string" ? message.details.path : undefined;
}

function describeFailure(message: ToolResultMessage): string {
	if (isRecord(message.details) && message.details.status === "cancelled") {
		return `${message.toolName}: cancelled by the user`;
	}
	return `${message.toolName}: ${clip(getText(message))}`;
}

/** Collect a specialist run into the structured result handed back to the orchestrator. */
export function buildAgentResult(task: AgentTask, run: AgentRunResult): AgentResult {
	const toolResults = run.messages.filter((m: Message): m is ToolResultMessage => m.role === "toolResult");
	const modified = new Set<string>();
	for (const message of toolResults) {
		const edited = editedPath(message);
		if (edited) modified.add(edited);
	}

	const outputs = run.finalText ?? "";
	const issues = toolResults.filter(m => m.isError).map(describeFailure);
	issues.push(...extractSection(outputs, "Issues"));
	if (run.error) issues.push(`${run.error.name}: ${run.error.message}`);

	return {
		agent: task.agent,
		task: task.description,
		success: !run.error && run.finalText !== undefined,
		outputs,
		modifiedResources: [...modified],
		issues,
		suggestions: extractSection(outputs, "Suggestions"),
		toolCalls: toolResults.length,
	};
}
