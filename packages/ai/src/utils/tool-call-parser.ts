import { isRecord } from "@finch/utils";

/**
 * Parser for the plain-text tool invocation format some local models fall back to:
 *
 *     tool: read_file({"path": "src/main.ts"})
 *
 * One invocation per line. Anything that is not exactly `tool:`, an identifier,
 * and a parenthesised JSON object is a ParseError; nothing is guessed.
 */
export type ParsedToolLine =
	| { kind: "call"; name: string; arguments: Record<string, unknown> }
	| { kind: "error"; line: string; reason: string };

const TOOL_LINE_PREFIX = /^tool:\s*/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;

export function parseToolLine(line: string): ParsedToolLine {
	const trimmed = line.trim();
	const prefix = TOOL_LINE_PREFIX.exec(trimmed);
	if (!prefix) return { kind: "error", line, reason: "line does not start with 'tool:'" };

	const rest = trimmed.slice(prefix[0].length);
	const ident = IDENTIFIER.exec(rest);
	if (!ident) return { kind: "error", line, reason: "missing tool name" };

	const name = ident[0];
	const call = rest.slice(name.length);
	if (!call.startsWith("(") || !call.endsWith(")")) {
		return { kind: "error", line, reason: `expected '(' JSON object ')' after ${name}` };
	}

	const body = call.slice(1, -1).trim();
	let parsed: unknown;
	try {
		parsed = JSON.parse(body || "{}");
	} catch (err) {
		return { kind: "error", line, reason: `arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
	}
	if (!isRecord(parsed)) {
		return { kind: "error", line, reason: "arguments must be a JSON object" };
	}
	return { kind: "call", name, arguments: parsed };
}

/** Parse every line of `text` that starts with `tool:`; other lines are ignored. */
export function extractToolLines(text: string): ParsedToolLine[] {
	return text
		.split("\n")
		.filter(line => TOOL_LINE_PREFIX.test(line.trim()))
		.map(parseToolLine);
}
