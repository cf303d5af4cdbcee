import type { AgentTool, AgentToolResult } from "@finch/agent";
import { ValidationError } from "@finch/ai";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { renderPrompt } from "../config/prompt-templates";
import { selectPlanSteps } from "../plan-mode/plan-selection";
import type { Plan, PlanSelection } from "../plan-mode/types";
import { ToolError } from "./tool-errors";
import { jsonResult } from "./tool-result";

const planStepSchema = Type.Object({
	description: Type.String({ description: "What the step does" }),
	agent: Type.Optional(Type.String({ description: "Specialist that carries it out (multi-agent mode)" })),
	rationale: Type.Optional(Type.String({ description: "Why the step is needed" })),
});

const proposePlanSchema = Type.Object({
	title: Type.String({ description: "Short name of the overall plan" }),
	steps: Type.Array(planStepSchema, { description: "Steps in execution order" }),
});

type ProposePlanParams = Static<typeof proposePlanSchema>;

export const PLAN_DECLINED_MESSAGE = "User declined the plan; no steps were started";

export class ProposePlanTool implements AgentTool<typeof proposePlanSchema, PlanSelection> {
	readonly name = "propose_plan";
	readonly label = "Plan";
	readonly description: string;
	readonly parameters = proposePlanSchema;

	constructor(private readonly session: ToolSession) {
		this.description = renderPrompt("tools/propose-plan");
	}

	async execute(
		_toolCallId: string,
		params: ProposePlanParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<PlanSelection>> {
		if (params.steps.length === 0) {
			throw new ValidationError("No steps provided in plan", this.name);
		}
		const prompter = this.session.prompter;
		if (!prompter) {
			throw new ToolError("Plans need an interactive user and none is attached; carry on without one.");
		}

		const plan: Plan = { title: params.title, steps: params.steps };
		const selection = await selectPlanSteps(plan, prompter, signal);
		const total = plan.steps.length;
		return jsonResult(
			{
				approved: selection.approved,
				selected_steps: selection.selectedIndices.map(index => index + 1),
				steps: selection.selectedSteps,
				original_steps: plan.steps,
				message: selection.approved
					? `User approved ${selection.selectedIndices.length} of ${total} steps. Run only these, in this order.`
					: PLAN_DECLINED_MESSAGE,
			},
			selection,
		);
	}
}
