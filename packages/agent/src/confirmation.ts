import { logger } from "@finch/utils";
import type { AgentTool } from "./types";

export interface ConfirmationRequest {
	toolCallId: string;
	toolName: string;
	label: string;
	args: Record<string, unknown>;
	/** Rendered call: the command, code or query the user is approving. */
	preview: string;
}

/**
 * Blocks a single pending call until the user answers. Implementations return
 * `false` for anything but an explicit yes, including EOF and interrupts.
 */
export interface ConfirmationGate {
	confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<boolean>;
}

const AFFIRMATIVE = new Set(["y", "yes"]);

export function isAffirmative(answer: string | undefined | null): boolean {
	return answer != null && AFFIRMATIVE.has(answer.trim().toLowerCase());
}

/**
 * Policy check for one invocation. A dangerous tool always asks; the per-call
 * check can only add prompts. Never cached: the same call twice is checked twice.
 */
export function needsConfirmation(tool: AgentTool, args: Record<string, unknown>): boolean {
	return tool.dangerous === true || tool.requiresConfirmation?.(args) === true;
}

export function renderCallPreview(tool: AgentTool, args: Record<string, unknown>): string {
	return tool.describeCall?.(args) ?? JSON.stringify(args, null, 2);
}

/**
 * Gate backed by a line prompt. `ask` resolves `undefined` on EOF; a rejected
 * `ask` (interrupt, closed input) counts as a decline.
 */
export function createPromptConfirmationGate(
	ask: (request: ConfirmationRequest, signal?: AbortSignal) => Promise<string | undefined>,
): ConfirmationGate {
	return {
		async confirm(request, signal) {
			try {
				return isAffirmative(await ask(request, signal));
			} catch (err) {
				logger.debug("Confirmation prompt ended without an answer", {
					toolName: request.toolName,
					error: err instanceof Error ? err.message : String(err),
				});
				return false;
			}
		},
	};
}

export const declineAll: ConfirmationGate = {
	confirm: async () => false,
};

export const approveAll: ConfirmationGate = {
	confirm: async () => true,
};
