import * as fs from "node:fs";
import * as path from "node:path";
import { approveAll, declineAll, ToolNotAllowedError } from "@finch/agent";
import { type ChatFn, ValidationError } from "@finch/ai";
import { AGENTS, type SpecialistId } from "@finch/coding-agent/multi-agent/agents";
import { buildSpecialistSeed, MultiAgentCoordinator } from "@finch/coding-agent/multi-agent/coordinator";
import { createToolCatalog, type ToolSession } from "@finch/coding-agent/tools";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	assistantMsg,
	createTempDir,
	createTestToolSession,
	removeTempDir,
	scriptedChat,
	testModel,
	toolCall,
	toolCallMsg,
} from "../utilities";

let dir: string;
let session: ToolSession;

function coordinatorWith(chat: ChatFn, overrides: Partial<ConstructorParameters<typeof MultiAgentCoordinator>[0]> = {}) {
	return new MultiAgentCoordinator({
		catalog: createToolCatalog(session),
		model: testModel,
		chat,
		cwd: dir,
		confirmation: approveAll,
		maxIterations: 5,
		...overrides,
	});
}

beforeEach(() => {
	dir = fs.realpathSync(createTempDir());
	session = createTestToolSession(dir);
});

afterEach(() => {
	session.shells.dispose();
	removeTempDir(dir);
});

describe("buildSpecialistSeed", () => {
	it("sends the bare description when there is no context", () => {
		expect(buildSpecialistSeed({ agent: "coding", description: "Fix the parser", context: {} })).toBe(
			"Fix the parser",
		);
	});

	it("appends the context as JSON", () => {
		expect(buildSpecialistSeed({ agent: "coding", description: "Fix it", context: { file: "a.ts" } })).toBe(
			'Fix it\n\nContext:\n{\n  "file": "a.ts"\n}',
		);
	});
});

describe("MultiAgentCoordinator registries", () => {
	it("gives each role only its own tools", () => {
		const coordinator = coordinatorWith(scriptedChat([]));

		expect(coordinator.registryFor("orchestrator").names()).toEqual(["propose_plan", "delegate_task"]);
		expect(coordinator.registryFor("research").names()).toEqual([...AGENTS.research.tools]);
		expect(() => coordinator.registryFor("research").lookup("edit_file")).toThrow(ToolNotAllowedError);
		expect(() => coordinator.registryFor("coding").lookup("delegate_task")).toThrow(ToolNotAllowedError);
	});

	it("renders role prompts with the working directory and tool list", () => {
		const prompt = coordinatorWith(scriptedChat([])).systemPromptFor("research");
		expect(prompt).toContain(`Working directory: ${dir}`);
		expect(prompt).toContain("Tools: read_file, list_files, search_code");
	});
});

describe("MultiAgentCoordinator.delegate", () => {
	it("runs the specialist on a fresh loop and collects its report", async () => {
		const chat = scriptedChat([
			toolCallMsg([
				toolCall("c1", "edit_file", { path: "out.txt", old_str: "", new_str: "done" }),
				toolCall("c2", "delegate_task", { agent: "research", task: "look around" }),
			]),
			assistantMsg("Wrote the file.\n\n## Issues\n- flaky test\n\n## Suggestions\n- add docs\n  for users"),
		]);
		const seen: SpecialistId[] = [];
		const coordinator = coordinatorWith(chat, { onSpecialistEvent: (agent: SpecialistId) => seen.push(agent) });

		const result = await coordinator.delegate({
			agent: " Coding ",
			description: "Write out.txt",
			context: { file: "out.txt" },
		});

		expect(result).toEqual({
			agent: "coding",
			task: "Write out.txt",
			success: true,
			outputs: "Wrote the file.\n\n## Issues\n- flaky test\n\n## Suggestions\n- add docs\n  for users",
			modifiedResources: ["out.txt"],
			issues: ["delegate_task: Tool delegate_task is not available to this agent", "flaky test"],
			suggestions: ["add docs for users"],
			toolCalls: 2,
		});
		expect(fs.readFileSync(path.join(dir, "out.txt"), "utf8")).toBe("done");
		expect(seen.length).toBeGreaterThan(0);
		expect(new Set(seen)).toEqual(new Set(["coding"]));

		const first = chat.requests[0];
		expect(first?.messages).toHaveLength(1);
		expect(first?.messages[0]?.content).toBe('Write out.txt\n\nContext:\n{\n  "file": "out.txt"\n}');
		expect(first?.tools?.map(tool => tool.name)).toEqual([...AGENTS.coding.tools]);
	});

	it("reports declined calls as issues", async () => {
		const chat = scriptedChat([
			toolCallMsg([toolCall("c1", "edit_file", { path: "out.txt", old_str: "", new_str: "done" })]),
			assistantMsg("Could not write."),
		]);
		const result = await coordinatorWith(chat, { confirmation: declineAll }).delegate({
			agent: "coding",
			description: "Write out.txt",
			context: {},
		});

		expect(result.success).toBe(true);
		expect(result.modifiedResources).toEqual([]);
		expect(result.issues).toEqual(["edit_file: cancelled by the user"]);
		expect(fs.existsSync(path.join(dir, "out.txt"))).toBe(false);
	});

	it("marks a run that hit the iteration cap as failed", async () => {
		const chat = scriptedChat([toolCallMsg([toolCall("c1", "read_file", { path: "nope.txt" })])]);
		const result = await coordinatorWith(chat, { maxIterations: 1 }).delegate({
			agent: "research",
			description: "Read nope.txt",
			context: {},
		});

		expect(result.success).toBe(false);
		expect(result.outputs).toBe("");
		expect(result.issues).toEqual([
			"read_file: File not found: nope.txt",
			"IterationCapExceededError: Stopped after 1 model calls without a final answer",
		]);
	});

	it("refuses the orchestrator and unknown agents", async () => {
		const coordinator = coordinatorWith(scriptedChat([]));

		await expect(
			coordinator.delegate({ agent: "orchestrator", description: "x", context: {} }),
		).rejects.toBeInstanceOf(ToolNotAllowedError);
		const unknown = coordinator.delegate({ agent: "wizard", description: "x", context: {} });
		await expect(unknown).rejects.toBeInstanceOf(ValidationError);
		await expect(unknown).rejects.toThrow(
			'Unknown agent "wizard". Choose one of: coding, research, testing, bioinformatics',
		);
	});

	it("runs independent tasks side by side and keeps their order", async () => {
		const chat: ChatFn = async (_model, context) => {
			const seed = context.messages[0];
			return assistantMsg(`done: ${seed?.role === "user" ? seed.content : ""}`);
		};
		const results = await coordinatorWith(chat).delegateParallel(
			[
				{ agent: "research", description: "one", context: {} },
				{ agent: "testing", description: "two", context: {} },
			],
			2,
		);

		expect(results.map(result => [result.agent, result.outputs])).toEqual([
			["research", "done: one"],
			["testing", "done: two"],
		]);
	});
});

describe("createOrchestrator", () => {
	it("builds an agent limited to planning and delegation", () => {
		const agent = coordinatorWith(scriptedChat([])).createOrchestrator({ messages: [] });
		expect(agent.state.registry.names()).toEqual(["propose_plan", "delegate_task"]);
		expect(agent.state.systemPrompt).toContain("**research**: Research specialist");
	});
});
