import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { getProjectContextPath, isEnoent, logger } from "@finch/utils";
import Handlebars from "handlebars";

export type TemplateContext = Record<string, unknown>;

const PROMPTS_DIR = fileURLToPath(new URL("../prompts/", import.meta.url));

const handlebars = Handlebars.create();

/**
 * {{#list items prefix="- " suffix="" join="\n"}}{{this}}{{/list}}
 * Renders an array with customizable prefix, suffix, and join separator.
 * Note: Use \n in join for newlines (will be unescaped automatically).
 */
handlebars.registerHelper(
	"list",
	function (this: unknown, context: unknown, options: Handlebars.HelperOptions): string {
		if (!Array.isArray(context) || context.length === 0) return "";
		const prefix = hashString(options, "prefix", "");
		const suffix = hashString(options, "suffix", "");
		const separator = hashString(options, "join", "\n").replace(/\\n/g, "\n").replace(/\\t/g, "\t");
		return context.map(item => `${prefix}${options.fn(item)}${suffix}`).join(separator);
	},
);

/**
 * {{join array ", "}}
 * Joins an array with a separator (default: ", ").
 */
handlebars.registerHelper("join", (context: unknown, separator?: unknown): string => {
	if (!Array.isArray(context)) return "";
	const sep = typeof separator === "string" ? separator : ", ";
	return context.join(sep);
});

function hashString(options: Handlebars.HelperOptions, key: string, fallback: string): string {
	const value: unknown = options.hash[key];
	return typeof value === "string" ? value : fallback;
}

export function renderPromptTemplate(template: string, context: TemplateContext = {}): string {
	const compiled = handlebars.compile(template, { noEscape: true, strict: false });
	return compiled(context).trim();
}

const promptCache = new Map<string, string>();

/**
 * Read a bundled prompt, e.g. `loadPrompt("agents/coding")` for `src/prompts/agents/coding.md`.
 */
export function loadPrompt(name: string): string {
	const cached = promptCache.get(name);
	if (cached !== undefined) return cached;
	const text = fs.readFileSync(`${PROMPTS_DIR}${name}.md`, "utf8");
	promptCache.set(name, text);
	return text;
}

export function renderPrompt(name: string, context: TemplateContext = {}): string {
	return renderPromptTemplate(loadPrompt(name), context);
}

/** Contents of `<cwd>/.finch/context.md`, or undefined when the project has none. */
export function loadProjectContext(cwd: string): string | undefined {
	const contextPath = getProjectContextPath(cwd);
	try {
		const text = fs.readFileSync(contextPath, "utf8").trim();
		return text || undefined;
	} catch (err) {
		if (!isEnoent(err)) {
			logger.warn("Failed to read project context", { path: contextPath, error: String(err) });
		}
		return undefined;
	}
}
