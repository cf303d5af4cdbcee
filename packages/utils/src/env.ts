import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigRootDir } from "./dirs";

/**
 * Parses a .env file and extracts key-value string pairs.
 * Blank lines and '#' comments are skipped; values may be single- or double-quoted.
 */
export function parseEnvFile(filePath: string): Record<string, string> {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch {
		return {};
	}
	const result: Record<string, string> = {};
	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, "").trim();
		let value = trimmed.slice(eqIndex + 1).trim();
		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}
		if (key) result[key] = value;
	}
	return result;
}

let loaded = false;

/**
 * Load the project's .env and ~/.finch/.env into process.env.
 * Variables already set in the environment win; the project file wins over the user file.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
	if (loaded) return;
	loaded = true;
	const files = [path.join(cwd, ".env"), path.join(getConfigRootDir(), ".env")];
	for (const file of files) {
		for (const [key, value] of Object.entries(parseEnvFile(file))) {
			if (!process.env[key]) {
				process.env[key] = value;
			}
		}
	}
}

/**
 * Resolve the first non-empty environment variable from the given keys.
 */
export function $pickenv(...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = process.env[key]?.trim();
		if (value) return value;
	}
	return undefined;
}
