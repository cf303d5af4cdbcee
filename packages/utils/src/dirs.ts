/**
 * Path helpers for the finch config root.
 *
 * FINCH_CONFIG_DIR overrides the root (default ~/.finch); tests point it at a temp dir.
 */
import * as os from "node:os";
import * as path from "node:path";

export const APP_NAME = "finch";

/** Per-user and per-project directory name. */
export const CONFIG_DIR_NAME = ".finch";

export const VERSION = "0.3.0";

/** Get the config root directory (~/.finch). */
export function getConfigRootDir(): string {
	const override = process.env.FINCH_CONFIG_DIR?.trim();
	if (override) return path.resolve(override);
	return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/** Get the settings file path (~/.finch/config.yml). */
export function getConfigPath(): string {
	return path.join(getConfigRootDir(), "config.yml");
}

/** Get the sessions directory (~/.finch/sessions). */
export function getSessionsDir(): string {
	return path.join(getConfigRootDir(), "sessions");
}

/** Get the logs directory (~/.finch/logs). */
export function getLogsDir(): string {
	return path.join(getConfigRootDir(), "logs");
}

/** Get the project-local config directory (<cwd>/.finch). */
export function getProjectConfigDir(cwd: string = process.cwd()): string {
	return path.join(cwd, CONFIG_DIR_NAME);
}

/** Get the project context file that seeds new sessions (<cwd>/.finch/context.md). */
export function getProjectContextPath(cwd: string = process.cwd()): string {
	return path.join(getProjectConfigDir(cwd), "context.md");
}
