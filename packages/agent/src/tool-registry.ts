import type { Tool } from "@finch/ai";
import { DuplicateToolError, RegistryFrozenError, ToolNotAllowedError, ToolNotFoundError } from "./errors";
import type { AgentTool } from "./types";

/**
 * Catalog of tools bound to one agent loop.
 *
 * Registration happens at startup; after `freeze()` the registry is read-only and can be
 * shared by reference. `subset()` derives a role-specific registry that remembers which
 * catalog tools it left out, so a call to one of those is rejected as not allowed rather
 * than unknown.
 */
export class ToolRegistry {
	readonly #tools = new Map<string, AgentTool>();
	readonly #excluded: ReadonlySet<string>;
	#frozen = false;

	constructor(tools: Iterable<AgentTool> = [], excluded: Iterable<string> = []) {
		this.#excluded = new Set(excluded);
		for (const tool of tools) {
			this.register(tool);
		}
	}

	get frozen(): boolean {
		return this.#frozen;
	}

	get size(): number {
		return this.#tools.size;
	}

	register(tool: AgentTool): this {
		if (this.#frozen) throw new RegistryFrozenError(tool.name);
		if (this.#tools.has(tool.name)) throw new DuplicateToolError(tool.name);
		this.#tools.set(tool.name, tool);
		return this;
	}

	freeze(): this {
		this.#frozen = true;
		return this;
	}

	has(name: string): boolean {
		return this.#tools.has(name);
	}

	get(name: string): AgentTool | undefined {
		return this.#tools.get(name);
	}

	/**
	 * @throws ToolNotAllowedError when the tool was deliberately left out of this registry
	 * @throws ToolNotFoundError when no catalog knows it
	 */
	lookup(name: string): AgentTool {
		const tool = this.#tools.get(name);
		if (tool) return tool;
		if (this.#excluded.has(name)) throw new ToolNotAllowedError(name);
		throw new ToolNotFoundError(name);
	}

	list(): AgentTool[] {
		return [...this.#tools.values()];
	}

	names(): string[] {
		return [...this.#tools.keys()];
	}

	/** Schemas in registration order, as sent to the model. */
	schemas(): Tool[] {
		return this.list().map(tool => ({ name: tool.name, description: tool.description, parameters: tool.parameters }));
	}

	/**
	 * Frozen registry holding only `names`, in the order given.
	 * @throws ToolNotFoundError for a name this registry does not hold
	 */
	subset(names: readonly string[]): ToolRegistry {
		const picked = names.map(name => this.lookup(name));
		const keep = new Set(names);
		const excluded = [...this.#excluded, ...this.names().filter(name => !keep.has(name))];
		return new ToolRegistry(picked, excluded).freeze();
	}

	/** Frozen registry holding everything except `names`. */
	without(names: readonly string[]): ToolRegistry {
		const drop = new Set(names);
		return this.subset(this.names().filter(name => !drop.has(name)));
	}
}
