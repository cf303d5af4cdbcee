/**
 * Settings schema: single source of truth for every setting.
 *
 * The Settings singleton provides type-safe path-based access:
 *   settings.get("model.host")           // => string
 *   settings.set("session.maxMessages", 200)  // sync, saves in background
 */

interface BaseDef {
	description: string;
	/** Environment variable that overrides the stored value for this process. */
	env?: string;
}

interface BooleanDef extends BaseDef {
	type: "boolean";
	default: boolean;
}

interface StringDef extends BaseDef {
	type: "string";
	default: string;
}

interface NumberDef extends BaseDef {
	type: "number";
	default: number;
	min?: number;
}

export type SettingDef = BooleanDef | StringDef | NumberDef;

export const SETTINGS_SCHEMA = {
	"model.host": {
		type: "string",
		default: "http://localhost:11434",
		description: "Ollama host; the OpenAI-compatible API is served under /v1",
		env: "OLLAMA_HOST",
	},
	"model.name": {
		type: "string",
		default: "llama3.2",
		description: "Model used for every agent role",
		env: "OLLAMA_MODEL",
	},
	"model.apiKey": {
		type: "string",
		default: "ollama",
		description: "API key sent to the endpoint (Ollama ignores it)",
	},
	"agent.maxIterations": {
		type: "number",
		default: 25,
		min: 1,
		description: "Model calls allowed per user turn before the turn is stopped",
	},
	"agent.multiAgent": {
		type: "boolean",
		default: false,
		description: "Start chats in multi-agent (orchestrator) mode",
	},
	"retry.maxRetries": {
		type: "number",
		default: 3,
		min: 0,
		description: "Retries of a failed model request before the turn fails",
	},
	"retry.baseDelayMs": {
		type: "number",
		default: 1000,
		min: 0,
		description: "Delay before the first retry; doubles on each further retry",
	},
	"session.maxMessages": {
		type: "number",
		default: 100,
		min: 2,
		description: "Messages kept per session; oldest are dropped first",
	},
	"shell.defaultTimeoutSeconds": {
		type: "number",
		default: 300,
		min: 1,
		description: "Timeout for commands in persistent shell sessions",
	},
	"shell.idleTimeoutSeconds": {
		type: "number",
		default: 1800,
		min: 1,
		description: "Persistent shells unused this long are terminated",
	},
	"shell.sweepIntervalSeconds": {
		type: "number",
		default: 60,
		min: 1,
		description: "How often idle shells are looked for",
	},
	"tools.commandTimeoutSeconds": {
		type: "number",
		default: 60,
		min: 1,
		description: "Timeout for one-off commands (bash, python, git)",
	},
	"tools.python": {
		type: "string",
		default: "python3",
		description: "Python interpreter used by run_python and create_venv",
	},
} as const satisfies Record<string, SettingDef>;

type Schema = typeof SETTINGS_SCHEMA;

/** All valid setting paths */
export type SettingPath = keyof Schema;

type ValueOf<D> = D extends { type: "boolean" } ? boolean : D extends { type: "number" } ? number : string;

/** Infer the value type for a setting path (a union of paths gives a union of types) */
export type SettingValue<P extends SettingPath> = ValueOf<Schema[P]>;

export const SETTING_PATHS = Object.keys(SETTINGS_SCHEMA).filter(isSettingPath);

export function isSettingPath(path: string): path is SettingPath {
	return Object.hasOwn(SETTINGS_SCHEMA, path);
}

export function getDef(path: SettingPath): SettingDef {
	return SETTINGS_SCHEMA[path];
}

/** Get the default value for a setting path */
export function getDefault<P extends SettingPath>(path: P): SettingValue<P> {
	return SETTINGS_SCHEMA[path].default as SettingValue<P>;
}

/** Check that `value` has the type the schema declares for `path`. */
export function matchesSchema(path: SettingPath, value: unknown): boolean {
	const def = getDef(path);
	switch (def.type) {
		case "boolean":
			return typeof value === "boolean";
		case "string":
			return typeof value === "string";
		case "number":
			return typeof value === "number" && Number.isFinite(value) && (def.min === undefined || value >= def.min);
	}
}

/**
 * Parse a value typed on the command line for `path`.
 * @throws Error when the text is not a valid value for the setting
 */
export function parseSettingValue(path: SettingPath, raw: string): SettingValue<SettingPath> {
	const def = getDef(path);
	const text = raw.trim();
	switch (def.type) {
		case "boolean": {
			const lowered = text.toLowerCase();
			if (["true", "yes", "on", "1"].includes(lowered)) return true;
			if (["false", "no", "off", "0"].includes(lowered)) return false;
			throw new Error(`${path} expects true or false, got "${raw}"`);
		}
		case "number": {
			const value = Number(text);
			if (!text || !matchesSchema(path, value)) {
				const floor = def.min === undefined ? "" : ` >= ${def.min}`;
				throw new Error(`${path} expects a number${floor}, got "${raw}"`);
			}
			return value;
		}
		case "string":
			return raw;
	}
}
