/**
 * Config CLI command handlers.
 *
 * Handles `finch config <command>` subcommands for managing settings.
 * Uses the settings schema as the source of truth for available settings.
 */
import chalk from "chalk";
import {
	getDef,
	isSettingPath,
	parseSettingValue,
	SETTING_PATHS,
	type SettingPath,
	type Settings,
} from "../config/settings";
import { CommandError } from "./errors";

// =============================================================================
// Types
// =============================================================================

export type ConfigAction = "list" | "get" | "set" | "reset" | "path";

export interface ConfigCommandArgs {
	action: ConfigAction;
	key?: string;
	value?: string;
}

export type Print = (text: string) => void;

// =============================================================================
// Value Formatting
// =============================================================================

function formatValue(value: unknown): string {
	if (typeof value === "boolean") {
		return value ? chalk.green("true") : chalk.red("false");
	}
	if (typeof value === "number") {
		return chalk.cyan(String(value));
	}
	return chalk.yellow(String(value));
}

function requirePath(action: string, key: string | undefined): SettingPath {
	if (!key) throw new CommandError(action, "missing setting key");
	if (!isSettingPath(key)) {
		throw new CommandError(action, `unknown setting "${key}". Run "finch config list" to see every setting.`);
	}
	return key;
}

// =============================================================================
// Command Handler
// =============================================================================

export async function runConfigCommand(cmd: ConfigCommandArgs, settings: Settings, print: Print): Promise<void> {
	switch (cmd.action) {
		case "list":
			for (const settingPath of SETTING_PATHS) {
				const source = settings.source(settingPath);
				const suffix = source === "default" ? "" : chalk.dim(` (${source})`);
				print(`${settingPath} = ${formatValue(settings.get(settingPath))}${suffix}`);
				print(chalk.dim(`    ${getDef(settingPath).description}`));
			}
			return;
		case "get": {
			const settingPath = requirePath("get setting", cmd.key);
			print(String(settings.get(settingPath)));
			return;
		}
		case "set": {
			const settingPath = requirePath("set setting", cmd.key);
			if (cmd.value === undefined) throw new CommandError("set setting", `missing value for ${settingPath}`);
			let value: ReturnType<typeof parseSettingValue>;
			try {
				value = parseSettingValue(settingPath, cmd.value);
			} catch (err) {
				throw new CommandError("set setting", err instanceof Error ? err.message : String(err), { cause: err });
			}
			settings.set(settingPath, value);
			await settings.flush();
			print(`${chalk.green("✓")} ${settingPath} = ${formatValue(value)}`);
			return;
		}
		case "reset": {
			if (cmd.key === undefined) {
				settings.reset();
				await settings.flush();
				print(`${chalk.green("✓")} All settings reset to defaults`);
				return;
			}
			const settingPath = requirePath("reset setting", cmd.key);
			settings.reset(settingPath);
			await settings.flush();
			print(`${chalk.green("✓")} ${settingPath} = ${formatValue(settings.get(settingPath))} (default)`);
			return;
		}
		case "path":
			print(settings.configPath ?? "(in memory)");
			return;
	}
}

export interface ConfigShortcuts {
	host?: string;
	model?: string;
}

/** `finch config --host URL --model NAME`: store the endpoint in one step. */
export async function applyConfigShortcuts(shortcuts: ConfigShortcuts, settings: Settings, print: Print): Promise<boolean> {
	const updates: [string, SettingPath][] = [];
	if (shortcuts.host !== undefined) updates.push([shortcuts.host, "model.host"]);
	if (shortcuts.model !== undefined) updates.push([shortcuts.model, "model.name"]);
	for (const [value, settingPath] of updates) {
		await runConfigCommand({ action: "set", key: settingPath, value }, settings, print);
	}
	return updates.length > 0;
}
