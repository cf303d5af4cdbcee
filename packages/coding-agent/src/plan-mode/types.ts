export interface PlanStep {
	description: string;
	/** Specialist expected to carry the step out (multi-agent mode). */
	agent?: string;
	rationale?: string;
}

export interface Plan {
	title: string;
	steps: PlanStep[];
}

export interface PlanSelection {
	approved: boolean;
	/** 0-based, ascending: plan order regardless of the order the user typed. */
	selectedIndices: number[];
	selectedSteps: PlanStep[];
	/** The plan as proposed. */
	plan: Plan;
}

export type ParsedPlanSelection =
	| { kind: "all" }
	| { kind: "none" }
	| { kind: "indices"; indices: number[] }
	| { kind: "invalid"; reason: string };
