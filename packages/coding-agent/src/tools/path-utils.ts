import * as os from "node:os";
import * as path from "node:path";

/** Expand a leading `~` to the home directory. */
export function expandPath(filePath: string): string {
	const trimmed = filePath.trim();
	if (trimmed === "~") return os.homedir();
	if (trimmed.startsWith("~/")) return path.join(os.homedir(), trimmed.slice(2));
	return trimmed;
}

/** Resolve a tool-supplied path against the session's working directory. */
export function resolveToCwd(filePath: string, cwd: string): string {
	const expanded = expandPath(filePath);
	return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(cwd, expanded);
}

/** Path as shown to the model: relative when inside `cwd`, absolute otherwise. */
export function displayPath(absolutePath: string, cwd: string): string {
	const relative = path.relative(cwd, absolutePath);
	if (!relative) return ".";
	return relative.startsWith("..") || path.isAbsolute(relative) ? absolutePath : relative;
}
