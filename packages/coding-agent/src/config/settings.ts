/**
 * Settings singleton with sync get/set and background persistence.
 *
 * Usage:
 *   import { settings } from "./settings";
 *
 *   const host = settings.get("model.host");   // sync read
 *   settings.set("model.name", "qwen2.5");     // sync write, saves in background
 *
 * For tests:
 *   const isolated = Settings.isolated({ "session.maxMessages": 4 });
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigPath, isEnoent, isRecord, logger } from "@finch/utils";
import * as yaml from "js-yaml";
import {
	getDef,
	getDefault,
	isSettingPath,
	matchesSchema,
	SETTING_PATHS,
	type SettingPath,
	type SettingValue,
} from "./settings-schema";

export * from "./settings-schema";

/** Raw settings object as stored in YAML */
export interface RawSettings {
	[key: string]: unknown;
}

export interface SettingsOptions {
	/** config.yml location; defaults to ~/.finch/config.yml */
	configPath?: string;
	/** Don't persist to disk (for tests) */
	inMemory?: boolean;
	/** Runtime overrides, e.g. from CLI flags */
	overrides?: Partial<Record<SettingPath, unknown>>;
	/** Environment to read overrides from (OLLAMA_HOST, OLLAMA_MODEL) */
	env?: NodeJS.ProcessEnv;
}

export type SettingSource = "default" | "file" | "env" | "override";

function getByPath(obj: RawSettings, segments: string[]): unknown {
	let current: unknown = obj;
	for (const segment of segments) {
		if (!isRecord(current)) return undefined;
		current = current[segment];
	}
	return current;
}

function setByPath(obj: RawSettings, segments: string[], value: unknown): void {
	let current = obj;
	for (const segment of segments.slice(0, -1)) {
		const next = current[segment];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: RawSettings = {};
			current[segment] = created;
			current = created;
		}
	}
	const last = segments[segments.length - 1];
	if (last !== undefined) current[last] = value;
}

function deleteByPath(obj: RawSettings, segments: string[]): void {
	const parent = getByPath(obj, segments.slice(0, -1));
	const last = segments[segments.length - 1];
	if (isRecord(parent) && last !== undefined) delete parent[last];
}

function deepMerge(base: RawSettings, overrides: RawSettings): RawSettings {
	const result: RawSettings = { ...base };
	for (const [key, override] of Object.entries(overrides)) {
		if (override === undefined) continue;
		const baseVal = base[key];
		result[key] = isRecord(override) && isRecord(baseVal) ? deepMerge(baseVal, override) : override;
	}
	return result;
}

export class Settings {
	readonly #configPath: string | null;
	/** Values from config.yml */
	#file: RawSettings = {};
	/** Environment overrides (not persisted) */
	#env: RawSettings = {};
	/** Runtime overrides (not persisted) */
	#overrides: RawSettings = {};
	#merged: RawSettings = {};
	#dirty = false;
	#saveTimer?: NodeJS.Timeout;
	#savePromise?: Promise<void>;

	private constructor(options: SettingsOptions) {
		this.#configPath = options.inMemory ? null : (options.configPath ?? getConfigPath());
		for (const [key, value] of Object.entries(options.overrides ?? {})) {
			if (value !== undefined && isSettingPath(key)) {
				setByPath(this.#overrides, key.split("."), value);
			}
		}
		const env = options.env ?? process.env;
		for (const settingPath of SETTING_PATHS) {
			const variable = getDef(settingPath).env;
			const value = variable ? env[variable]?.trim() : undefined;
			if (value) setByPath(this.#env, settingPath.split("."), value);
		}
	}

	/**
	 * Initialize the global singleton.
	 * Call once at startup before accessing `settings`.
	 */
	static async init(options: SettingsOptions = {}): Promise<Settings> {
		if (globalInstance) return globalInstance;
		const instance = new Settings(options);
		await instance.#load();
		globalInstance = instance;
		return instance;
	}

	/**
	 * Create an isolated instance for testing.
	 * Does not affect the global singleton.
	 */
	static isolated(overrides: Partial<Record<SettingPath, unknown>> = {}): Settings {
		const instance = new Settings({ inMemory: true, overrides, env: {} });
		instance.#rebuildMerged();
		return instance;
	}

	static get instance(): Settings {
		if (!globalInstance) {
			throw new Error("Settings not initialized. Call Settings.init() first.");
		}
		return globalInstance;
	}

	get configPath(): string | null {
		return this.#configPath;
	}

	/**
	 * Get a setting value (sync).
	 * Overrides win over environment, environment over config.yml; values of the wrong
	 * type fall back to the default.
	 */
	get<P extends SettingPath>(path: P): SettingValue<P> {
		const value = getByPath(this.#merged, path.split("."));
		if (value !== undefined && matchesSchema(path, value)) {
			return value as SettingValue<P>;
		}
		return getDefault(path);
	}

	/** Where the effective value of `path` comes from. */
	source(path: SettingPath): SettingSource {
		const segments = path.split(".");
		if (getByPath(this.#overrides, segments) !== undefined) return "override";
		if (getByPath(this.#env, segments) !== undefined) return "env";
		const stored = getByPath(this.#file, segments);
		if (stored !== undefined && matchesSchema(path, stored)) return "file";
		return "default";
	}

	/**
	 * Set a setting value (sync) and queue a background save.
	 * @throws Error when the value does not match the schema
	 */
	set<P extends SettingPath>(path: P, value: SettingValue<P>): void {
		if (!matchesSchema(path, value)) {
			throw new Error(`Invalid value for ${path}: ${JSON.stringify(value)}`);
		}
		setByPath(this.#file, path.split("."), value);
		this.#dirty = true;
		this.#rebuildMerged();
		this.#queueSave();
	}

	/** Remove a stored value (or all of them), falling back to the default. */
	reset(path?: SettingPath): void {
		if (path) {
			deleteByPath(this.#file, path.split("."));
		} else {
			this.#file = {};
		}
		this.#dirty = true;
		this.#rebuildMerged();
		this.#queueSave();
	}

	/** Apply a runtime override (not persisted). */
	override<P extends SettingPath>(path: P, value: SettingValue<P>): void {
		setByPath(this.#overrides, path.split("."), value);
		this.#rebuildMerged();
	}

	/**
	 * Flush any pending saves to disk.
	 * Call before exit to ensure all changes are persisted.
	 */
	async flush(): Promise<void> {
		if (this.#saveTimer) {
			clearTimeout(this.#saveTimer);
			this.#saveTimer = undefined;
		}
		if (this.#savePromise) {
			await this.#savePromise;
		}
		if (this.#dirty) {
			await this.#saveNow();
		}
	}

	async #load(): Promise<void> {
		if (this.#configPath) {
			this.#file = await this.#loadYaml(this.#configPath);
		}
		this.#rebuildMerged();
	}

	async #loadYaml(filePath: string): Promise<RawSettings> {
		let content: string;
		try {
			content = await fs.promises.readFile(filePath, "utf-8");
		} catch (error) {
			if (isEnoent(error)) return {};
			logger.warn("Settings: failed to read", { path: filePath, error: String(error) });
			return {};
		}
		try {
			const parsed: unknown = yaml.load(content);
			return isRecord(parsed) ? parsed : {};
		} catch (error) {
			logger.warn("Settings: invalid YAML, using defaults", { path: filePath, error: String(error) });
			return {};
		}
	}

	#queueSave(): void {
		if (!this.#configPath) return;
		// Debounce: wait 100ms for more changes
		if (this.#saveTimer) {
			clearTimeout(this.#saveTimer);
		}
		this.#saveTimer = setTimeout(() => {
			this.#saveTimer = undefined;
			this.#savePromise = this.#saveNow()
				.catch(err => {
					logger.warn("Settings: background save failed", { error: String(err) });
				})
				.finally(() => {
					this.#savePromise = undefined;
				});
		}, 100);
	}

	async #saveNow(): Promise<void> {
		const configPath = this.#configPath;
		if (!configPath || !this.#dirty) return;
		this.#dirty = false;
		try {
			await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
			const tmpPath = `${configPath}.${process.pid}.tmp`;
			await fs.promises.writeFile(tmpPath, yaml.dump(this.#file, { indent: 2 }));
			await fs.promises.rename(tmpPath, configPath);
		} catch (error) {
			this.#dirty = true;
			throw error;
		}
	}

	#rebuildMerged(): void {
		this.#merged = deepMerge(deepMerge(this.#file, this.#env), this.#overrides);
	}
}

let globalInstance: Settings | null = null;

/**
 * Reset the global singleton for testing.
 * @internal
 */
export function _resetSettingsForTest(): void {
	globalInstance = null;
}
