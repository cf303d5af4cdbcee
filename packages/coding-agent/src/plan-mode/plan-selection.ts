import { logger } from "@finch/utils";
import chalk from "chalk";
import type { Prompter } from "../modes/types";
import type { ParsedPlanSelection, Plan, PlanSelection } from "./types";

const CONFIRM_ANSWERS = new Set(["", "y", "yes"]);

/**
 * Parse what the user typed at the step prompt.
 *
 * Step numbers are 1-based and may be separated by spaces or commas. The result holds
 * 0-based indices, deduplicated and ascending. A number outside the plan makes the
 * whole answer invalid; nothing is silently dropped.
 */
export function parsePlanSelection(input: string, stepCount: number): ParsedPlanSelection {
	const text = input.trim().toLowerCase();
	if (text === "" || text === "none") return { kind: "none" };
	if (text === "all") return { kind: "all" };

	const picked = new Set<number>();
	for (const token of text.split(/[\s,]+/).filter(Boolean)) {
		if (!/^\d+$/.test(token)) {
			return { kind: "invalid", reason: `"${token}" is not a step number. Enter numbers, "all" or "none".` };
		}
		const step = Number.parseInt(token, 10);
		if (step < 1 || step > stepCount) {
			return { kind: "invalid", reason: `Step ${step} does not exist. Enter numbers between 1 and ${stepCount}.` };
		}
		picked.add(step - 1);
	}
	return { kind: "indices", indices: [...picked].sort((a, b) => a - b) };
}

export function renderPlan(plan: Plan): string {
	const lines = [chalk.bold.cyan(`Plan: ${plan.title}`), ""];
	plan.steps.forEach((step, index) => {
		const agent = step.agent ? chalk.magenta(` [${step.agent}]`) : "";
		lines.push(`  ${chalk.cyan(`${index + 1}.`)} ${step.description}${agent}`);
		if (step.rationale) lines.push(chalk.dim(`     ${step.rationale}`));
	});
	lines.push(
		"",
		chalk.dim('Enter step numbers (e.g. "1 3"), "all" for every step, or "none" / empty to cancel.'),
	);
	return lines.join("\n");
}

function declined(plan: Plan): PlanSelection {
	return { approved: false, selectedIndices: [], selectedSteps: [], plan };
}

/**
 * Show the plan, read a selection (re-prompting on invalid input) and confirm it.
 * EOF or interrupt at either prompt declines the plan.
 */
export async function selectPlanSteps(plan: Plan, prompter: Prompter, signal?: AbortSignal): Promise<PlanSelection> {
	prompter.print(renderPlan(plan));

	let indices: number[] | undefined;
	while (indices === undefined) {
		const answer = await prompter.ask("Select steps: ", signal);
		if (answer === undefined) {
			prompter.print(chalk.yellow("Plan cancelled."));
			return declined(plan);
		}
		const parsed = parsePlanSelection(answer, plan.steps.length);
		switch (parsed.kind) {
			case "none":
				prompter.print(chalk.yellow("No steps selected. Plan cancelled."));
				return declined(plan);
			case "all":
				indices = plan.steps.map((_, index) => index);
				break;
			case "indices":
				indices = parsed.indices;
				break;
			case "invalid":
				prompter.print(chalk.red(parsed.reason));
				break;
		}
	}

	const selectedSteps = indices.map(index => plan.steps[index]).filter(step => step !== undefined);
	prompter.print(
		[
			chalk.bold.green("Selected steps:"),
			...indices.map(index => `  ${chalk.cyan(`${index + 1}.`)} ${plan.steps[index]?.description ?? ""}`),
		].join("\n"),
	);

	const confirm = await prompter.ask(`Execute ${indices.length} selected step(s)? [Y/n] `, signal);
	if (confirm === undefined || !CONFIRM_ANSWERS.has(confirm.trim().toLowerCase())) {
		prompter.print(chalk.yellow("Plan cancelled."));
		return declined(plan);
	}

	logger.info("Plan approved", { title: plan.title, selected: indices.length, total: plan.steps.length });
	return { approved: true, selectedIndices: indices, selectedSteps, plan };
}
