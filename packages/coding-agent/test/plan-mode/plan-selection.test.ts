import { parsePlanSelection, selectPlanSteps } from "@finch/coding-agent/plan-mode/plan-selection";
import type { Plan } from "@finch/coding-agent/plan-mode/types";
import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { ScriptedPrompter } from "../utilities";

const plan: Plan = {
	title: "Add retry support",
	steps: [{ description: "A" }, { description: "B", agent: "coding" }, { description: "C", rationale: "verify" }],
};

beforeAll(() => {
	chalk.level = 0;
});

describe("parsePlanSelection", () => {
	it("returns indices in plan order, deduplicated", () => {
		expect(parsePlanSelection("2 1", 3)).toEqual({ kind: "indices", indices: [0, 1] });
		expect(parsePlanSelection("1,3, 3", 3)).toEqual({ kind: "indices", indices: [0, 2] });
	});

	it("recognizes all and none", () => {
		expect(parsePlanSelection("ALL", 3)).toEqual({ kind: "all" });
		expect(parsePlanSelection("", 3)).toEqual({ kind: "none" });
		expect(parsePlanSelection("  none ", 3)).toEqual({ kind: "none" });
	});

	it("rejects numbers outside the plan and other text", () => {
		expect(parsePlanSelection("0", 3)).toEqual({
			kind: "invalid",
			reason: "Step 0 does not exist. Enter numbers between 1 and 3.",
		});
		expect(parsePlanSelection("1 two", 3)).toEqual({
			kind: "invalid",
			reason: '"two" is not a step number. Enter numbers, "all" or "none".',
		});
		expect(parsePlanSelection("-1", 3)).toEqual({
			kind: "invalid",
			reason: '"-1" is not a step number. Enter numbers, "all" or "none".',
		});
	});
});

describe("selectPlanSteps", () => {
	it("selects steps in their original order", async () => {
		const prompter = new ScriptedPrompter(["2 1", ""]);
		const selection = await selectPlanSteps(plan, prompter);

		expect(selection.approved).toBe(true);
		expect(selection.selectedIndices).toEqual([0, 1]);
		expect(selection.selectedSteps.map(step => step.description)).toEqual(["A", "B"]);
		expect(prompter.questions).toEqual(["Select steps: ", "Execute 2 selected step(s)? [Y/n] "]);
	});

	it("selects every step for all", async () => {
		const selection = await selectPlanSteps(plan, new ScriptedPrompter(["all", "y"]));
		expect(selection.selectedSteps).toEqual(plan.steps);
	});

	it("declines on none without asking for confirmation", async () => {
		const prompter = new ScriptedPrompter(["none"]);
		const selection = await selectPlanSteps(plan, prompter);

		expect(selection).toEqual({ approved: false, selectedIndices: [], selectedSteps: [], plan });
		expect(prompter.questions).toHaveLength(1);
	});

	it("asks again after invalid input", async () => {
		const prompter = new ScriptedPrompter(["9", "3", "yes"]);
		const selection = await selectPlanSteps(plan, prompter);

		expect(prompter.printed).toContain("Step 9 does not exist. Enter numbers between 1 and 3.");
		expect(selection.selectedSteps.map(step => step.description)).toEqual(["C"]);
		expect(prompter.questions).toHaveLength(3);
	});

	it("declines when the confirmation is refused", async () => {
		const selection = await selectPlanSteps(plan, new ScriptedPrompter(["1 2", "n"]));
		expect(selection.approved).toBe(false);
		expect(selection.selectedSteps).toEqual([]);
	});

	it("treats end of input as a decline at either prompt", async () => {
		expect((await selectPlanSteps(plan, new ScriptedPrompter([undefined]))).approved).toBe(false);
		expect((await selectPlanSteps(plan, new ScriptedPrompter(["1", undefined]))).approved).toBe(false);
	});
});
