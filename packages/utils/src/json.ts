/**
 * Try to parse JSON, returning null on failure.
 */
export function tryParseJson(content: string): unknown {
	try {
		return JSON.parse(content) as unknown;
	} catch {
		return null;
	}
}

/** Stable, human-readable JSON for prompts and tool output. */
export function formatJson(value: unknown): string {
	return JSON.stringify(value, null, 2) ?? "null";
}
