import * as fs from "node:fs/promises";
import * as path from "node:path";
import { getProjectContextPath, logger } from "@finch/utils";
import { renderPrompt } from "../config/prompt-templates";
import { CommandError } from "./errors";

/**
 * Create `<dir>/.finch/context.md` from the bundled template.
 * New sessions started in that directory open with its contents.
 * @returns the created file's path
 */
export async function initProjectContext(dir: string): Promise<string> {
	const projectDir = path.resolve(dir);
	const contextPath = getProjectContextPath(projectDir);
	const content = `${renderPrompt("templates/project-context", { project: path.basename(projectDir) })}\n`;
	await fs.mkdir(path.dirname(contextPath), { recursive: true });
	try {
		await fs.writeFile(contextPath, content, { flag: "wx" });
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "EEXIST") {
			throw new CommandError("init project", `${contextPath} already exists`, { cause: err });
		}
		throw err;
	}
	logger.info("Project context created", { path: contextPath });
	return contextPath;
}
