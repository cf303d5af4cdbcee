import type { AgentTool, AgentToolResult } from "@finch/agent";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { renderPrompt } from "../config/prompt-templates";
import { AGENTS, SPECIALIST_IDS } from "../multi-agent/agents";
import type { AgentResult } from "../multi-agent/types";
import { ToolError } from "./tool-errors";
import { jsonResult } from "./tool-result";

const delegateTaskSchema = Type.Object({
	agent: Type.String({ description: `Specialist id: ${SPECIALIST_IDS.join(", ")}` }),
	task: Type.String({ description: "What the specialist should do, stated completely" }),
	context: Type.Optional(
		Type.Record(Type.String(), Type.Unknown(), {
			description: "Facts the specialist needs: file paths, earlier findings, constraints",
		}),
	),
});

type DelegateTaskParams = Static<typeof delegateTaskSchema>;

export class DelegateTaskTool implements AgentTool<typeof delegateTaskSchema, AgentResult> {
	readonly name = "delegate_task";
	readonly label = "Delegate";
	readonly description: string;
	readonly parameters = delegateTaskSchema;

	constructor(private readonly session: ToolSession) {
		this.description = renderPrompt("tools/delegate-task", {
			specialists: SPECIALIST_IDS.map(id => AGENTS[id]),
		});
	}

	describeCall(args: DelegateTaskParams): string {
		return `${args.agent}: ${args.task}`;
	}

	async execute(
		_toolCallId: string,
		params: DelegateTaskParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<AgentResult>> {
		const target = this.session.delegation;
		if (!target) {
			throw new ToolError("Delegation is only available in multi-agent mode");
		}
		const result = await target.delegate(
			{ agent: params.agent, description: params.task, context: params.context ?? {} },
			signal,
		);
		return jsonResult(
			{
				agent: result.agent,
				success: result.success,
				outputs: result.outputs,
				modifiedResources: result.modifiedResources,
				issues: result.issues,
				suggestions: result.suggestions,
			},
			result,
		);
	}
}
