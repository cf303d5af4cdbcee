import { ValidationError } from "@finch/ai";
import { PLAN_DECLINED_MESSAGE, ProposePlanTool } from "@finch/coding-agent/tools/propose-plan";
import { ToolError } from "@finch/coding-agent/tools/tool-errors";
import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, createTestToolSession, removeTempDir, ScriptedPrompter } from "../utilities";

const steps = [{ description: "Read the parser" }, { description: "Fix the bug" }, { description: "Run the tests" }];

function resultJson(text: string | undefined): unknown {
	return JSON.parse(text ?? "null");
}

describe("propose_plan", () => {
	let dir: string;

	beforeAll(() => {
		chalk.level = 0;
	});

	beforeEach(() => {
		dir = createTempDir();
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	it("returns the approved steps in plan order", async () => {
		const tool = new ProposePlanTool(createTestToolSession(dir, { prompter: new ScriptedPrompter(["3 1", "y"]) }));
		const result = await tool.execute("call-1", { title: "Fix parser", steps });

		expect(resultJson(result.content[0]?.text)).toEqual({
			approved: true,
			selected_steps: [1, 3],
			steps: [steps[0], steps[2]],
			original_steps: steps,
			message: "User approved 2 of 3 steps. Run only these, in this order.",
		});
		expect(result.details?.selectedIndices).toEqual([0, 2]);
	});

	it("reports a declined plan", async () => {
		const tool = new ProposePlanTool(createTestToolSession(dir, { prompter: new ScriptedPrompter(["none"]) }));
		const result = await tool.execute("call-1", { title: "Fix parser", steps });

		expect(resultJson(result.content[0]?.text)).toEqual({
			approved: false,
			selected_steps: [],
			steps: [],
			original_steps: steps,
			message: PLAN_DECLINED_MESSAGE,
		});
	});

	it("rejects an empty plan", async () => {
		const tool = new ProposePlanTool(createTestToolSession(dir, { prompter: new ScriptedPrompter([]) }));
		const attempt = tool.execute("call-1", { title: "Nothing", steps: [] });
		await expect(attempt).rejects.toBeInstanceOf(ValidationError);
		await expect(attempt).rejects.toThrow("No steps provided in plan");
	});

	it("fails without an interactive user", async () => {
		const tool = new ProposePlanTool(createTestToolSession(dir));
		await expect(tool.execute("call-1", { title: "Fix parser", steps })).rejects.toBeInstanceOf(ToolError);
	});
});
