import { type TUnsafe, Type } from "@sinclair/typebox";

/**
 * String enum as a plain `{ type: "string", enum: [...] }` schema. Small local models
 * follow this far more reliably than the anyOf/const form `Type.Union` produces.
 *
 * @example
 * const ActionSchema = StringEnum(["status", "log", "diff"], { description: "Git action" });
 * type Action = Static<typeof ActionSchema>; // "status" | "log" | "diff"
 */
export function StringEnum<const T extends readonly string[]>(
	values: T,
	options?: { description?: string; default?: T[number] },
): TUnsafe<T[number]> {
	return Type.Unsafe<T[number]>({
		type: "string",
		enum: [...values],
		...(options?.description && { description: options.description }),
		...(options?.default && { default: options.default }),
	});
}
