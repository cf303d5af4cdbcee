import type { AgentToolResult } from "@finch/agent";
import { formatJson } from "@finch/utils";

export function textResult<TDetails>(text: string, details?: TDetails): AgentToolResult<TDetails> {
	return { content: [{ type: "text", text }], details };
}

/** Result whose text is pretty JSON of `value`; the model reads structured outcomes this way. */
export function jsonResult<TDetails>(value: unknown, details?: TDetails): AgentToolResult<TDetails> {
	return textResult(formatJson(value), details);
}
