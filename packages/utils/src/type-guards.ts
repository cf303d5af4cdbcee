export function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/** True for a Node system error with the ENOENT code. */
export function isEnoent(err: unknown): boolean {
	return isRecord(err) && err.code === "ENOENT";
}
