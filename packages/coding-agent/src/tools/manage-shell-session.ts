import type { AgentTool, AgentToolResult } from "@finch/agent";
import { StringEnum } from "@finch/ai";
import { type Static, Type } from "@sinclair/typebox";
import type { ToolSession } from ".";
import { ToolError } from "./tool-errors";
import { jsonResult } from "./tool-result";

const manageShellSessionSchema = Type.Object({
	action: StringEnum(["list", "info", "terminate", "terminate_all", "cleanup"], {
		description: "list: active shells; info: one shell; terminate: stop one; terminate_all: stop all; cleanup: stop idle shells",
	}),
	session_id: Type.Optional(Type.String({ description: "Shell id, for info and terminate" })),
});

type ManageShellSessionParams = Static<typeof manageShellSessionSchema>;

const DESTRUCTIVE_ACTIONS = new Set(["terminate", "terminate_all"]);

export class ManageShellSessionTool implements AgentTool<typeof manageShellSessionSchema> {
	readonly name = "manage_shell_session";
	readonly label = "Shells";
	readonly description = "Inspect or stop the persistent shells started by run_bash with a session_id.";
	readonly parameters = manageShellSessionSchema;

	constructor(private readonly session: ToolSession) {}

	requiresConfirmation(args: ManageShellSessionParams): boolean {
		return DESTRUCTIVE_ACTIONS.has(args.action);
	}

	describeCall(args: ManageShellSessionParams): string {
		return args.session_id ? `${args.action} shell ${args.session_id}` : args.action;
	}

	async execute(_toolCallId: string, params: ManageShellSessionParams): Promise<AgentToolResult> {
		const shells = this.session.shells;
		switch (params.action) {
			case "list":
				return jsonResult({ sessions: shells.list() });
			case "info": {
				const id = requireSessionId(params);
				const info = shells.getInfo(id);
				if (!info) throw new ToolError(`No shell session named ${id}`);
				return jsonResult(info);
			}
			case "terminate": {
				const id = requireSessionId(params);
				if (!shells.terminate(id)) throw new ToolError(`No shell session named ${id}`);
				return jsonResult({ terminated: [id] });
			}
			case "terminate_all":
				return jsonResult({ terminated: shells.terminateAll() });
			case "cleanup":
				return jsonResult({ terminated: shells.sweepIdle() });
		}
	}
}

function requireSessionId(params: ManageShellSessionParams): string {
	if (!params.session_id) throw new ToolError(`session_id is required for ${params.action}`);
	return params.session_id;
}
