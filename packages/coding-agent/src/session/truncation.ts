import type { Message } from "@finch/ai";

/**
 * Split history into units that are kept or dropped whole: an assistant message
 * together with the tool results answering its calls, or any other single message.
 */
function groupUnits(messages: readonly Message[]): Message[][] {
	const units: Message[][] = [];
	for (const message of messages) {
		const current = units.at(-1);
		if (message.role === "toolResult" && current && unitOwnsResult(current, message.toolCallId)) {
			current.push(message);
			continue;
		}
		units.push([message]);
	}
	return units;
}

function unitOwnsResult(unit: readonly Message[], toolCallId: string): boolean {
	const head = unit[0];
	if (head?.role !== "assistant") return false;
	return head.content.some(block => block.type === "toolCall" && block.id === toolCallId);
}

/**
 * Drop the oldest messages until at most `max` remain.
 *
 * A tool call and its results go together. A pinned leading message always stays, and
 * so does the newest unit, so the result can exceed `max` when that unit alone is larger.
 */
export function truncateMessages(messages: readonly Message[], max: number): Message[] {
	if (messages.length <= max) return [...messages];

	const first = messages[0];
	const pinned = first?.role === "user" && first.pinned ? [first] : [];
	const units = groupUnits(messages.slice(pinned.length));

	let total = messages.length;
	let start = 0;
	while (total > max && start < units.length - 1) {
		total -= units[start]?.length ?? 0;
		start++;
	}
	return [...pinned, ...units.slice(start).flat()];
}
