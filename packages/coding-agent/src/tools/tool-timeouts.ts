export interface ToolTimeoutConfig {
	/** Minimum allowed timeout in seconds */
	min: number;
	/** Maximum allowed timeout in seconds (per-tool ceiling) */
	max: number;
}

export const TOOL_TIMEOUTS = {
	run_bash: { min: 1, max: 3600 },
	run_python: { min: 1, max: 600 },
	git: { min: 1, max: 600 },
	create_venv: { min: 1, max: 600 },
	install_deps: { min: 1, max: 3600 },
} as const satisfies Record<string, ToolTimeoutConfig>;

export type ToolWithTimeout = keyof typeof TOOL_TIMEOUTS;

/**
 * Clamp a requested timeout (seconds) to the tool's range.
 * Without a request the configured default applies.
 */
export function clampTimeout(tool: ToolWithTimeout, rawTimeout: number | undefined, fallback: number): number {
	const config = TOOL_TIMEOUTS[tool];
	const timeout = rawTimeout ?? fallback;
	return Math.max(config.min, Math.min(config.max, timeout));
}
