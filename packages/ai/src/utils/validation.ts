import type { TSchema } from "@sinclair/typebox";
import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { isRecord } from "@finch/utils";
import { ValidationError } from "../errors";
import type { Tool, ToolCall } from "../types";

// Models sometimes send a number, array or object JSON-encoded inside a string
// ("[1, 2]" for an array parameter). Type errors on such strings are retried
// with the parsed value, and only accepted when the parsed type is the one the
// schema asked for.

const NUMERIC_STRING_PATTERN = /^[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const MAX_TYPE_COERCION_PASSES = 5;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const compiled = new WeakMap<TSchema, ValidateFunction>();

function getValidator(schema: TSchema): ValidateFunction {
	let validate = compiled.get(schema);
	if (!validate) {
		validate = ajv.compile(schema);
		compiled.set(schema, validate);
	}
	return validate;
}

function expectedTypes(error: ErrorObject): string[] {
	const type: unknown = error.params.type;
	if (typeof type === "string") return [type];
	if (Array.isArray(type)) return type.filter((entry): entry is string => typeof entry === "string");
	return [];
}

function matchesType(value: unknown, types: string[]): boolean {
	return types.some(type => {
		switch (type) {
			case "number":
				return typeof value === "number" && Number.isFinite(value);
			case "integer":
				return typeof value === "number" && Number.isInteger(value);
			case "boolean":
				return typeof value === "boolean";
			case "null":
				return value === null;
			case "array":
				return Array.isArray(value);
			case "object":
				return isRecord(value);
			default:
				return false;
		}
	});
}

function parseForTypes(raw: string, types: string[]): { value: unknown } | undefined {
	const trimmed = raw.trim();
	if (!trimmed) return undefined;
	if (NUMERIC_STRING_PATTERN.test(trimmed)) {
		const parsed = Number(trimmed);
		return matchesType(parsed, types) ? { value: parsed } : undefined;
	}
	const looksJson =
		(trimmed.startsWith("{") && trimmed.endsWith("}")) ||
		(trimmed.startsWith("[") && trimmed.endsWith("]")) ||
		trimmed === "true" ||
		trimmed === "false" ||
		trimmed === "null";
	if (!looksJson) return undefined;
	try {
		const parsed: unknown = JSON.parse(trimmed);
		return matchesType(parsed, types) ? { value: parsed } : undefined;
	} catch {
		return undefined;
	}
}

/** JSON Pointer segments (RFC 6901) of an ajv instancePath. */
function pointerSegments(pointer: string): string[] {
	if (!pointer) return [];
	return pointer
		.split("/")
		.slice(1)
		.map(segment => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function childOf(container: unknown, segment: string): unknown {
	if (Array.isArray(container)) return container[Number(segment)];
	return isRecord(container) ? container[segment] : undefined;
}

function getAt(root: unknown, pointer: string): unknown {
	let current = root;
	for (const segment of pointerSegments(pointer)) {
		current = childOf(current, segment);
	}
	return current;
}

function setAt(root: unknown, pointer: string, value: unknown): void {
	const segments = pointerSegments(pointer);
	const last = segments.pop();
	if (last === undefined) return;
	let parent = root;
	for (const segment of segments) {
		parent = childOf(parent, segment);
	}
	if (Array.isArray(parent)) {
		parent[Number(last)] = value;
	} else if (isRecord(parent)) {
		parent[last] = value;
	}
}

/** Drop `null` from optional top-level properties; models send it for "not given". */
function dropOptionalNulls(schema: TSchema, args: Record<string, unknown>): Record<string, unknown> {
	const properties: unknown = schema.properties;
	if (!isRecord(properties)) return args;
	const requiredList: unknown = schema.required;
	const required = new Set(Array.isArray(requiredList) ? requiredList : []);
	const next: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(args)) {
		if (value === null && key in properties && !required.has(key)) continue;
		next[key] = value;
	}
	return next;
}

function formatIssues(errors: ErrorObject[] | null | undefined): string[] {
	if (!errors?.length) return ["root: invalid arguments"];
	return errors.map(err => {
		const missing: unknown = err.params.missingProperty;
		const path = err.instancePath ? err.instancePath.slice(1) : typeof missing === "string" ? missing : "root";
		return `${path}: ${err.message ?? "invalid"}`;
	});
}

/**
 * Validate tool call arguments against the tool's TypeBox schema.
 * @returns the (possibly coerced) arguments
 * @throws ValidationError listing every issue when the arguments cannot be made valid
 */
export function validateToolArguments(tool: Tool, toolCall: ToolCall): Record<string, unknown> {
	const validate = getValidator(tool.parameters);
	if (validate(toolCall.arguments)) return toolCall.arguments;

	const args = structuredClone(dropOptionalNulls(tool.parameters, toolCall.arguments));
	if (validate(args)) return args;

	for (let pass = 0; pass < MAX_TYPE_COERCION_PASSES; pass++) {
		let changed = false;
		for (const error of validate.errors ?? []) {
			if (error.keyword !== "type") continue;
			const current = getAt(args, error.instancePath);
			if (typeof current !== "string") continue;
			const parsed = parseForTypes(current, expectedTypes(error));
			if (!parsed) continue;
			setAt(args, error.instancePath, parsed.value);
			changed = true;
		}
		if (!changed) break;
		if (validate(args)) return args;
	}

	const issues = formatIssues(validate.errors);
	throw new ValidationError(
		`Validation failed for tool "${toolCall.name}":\n${issues.map(issue => `  - ${issue}`).join("\n")}\n\nReceived arguments:\n${JSON.stringify(toolCall.arguments, null, 2)}`,
		toolCall.name,
		issues,
	);
}
