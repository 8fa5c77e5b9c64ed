/**
 * Edge conditions.
 *
 * A structure condition is checked against the graph itself. An executable
 * condition is answered by another actor through a mail round trip.
 */

import type { IdType } from "@karya/core";
import type { Graph } from "./graph.js";

export type ConditionSource = "structure" | "executable";

export interface StructureCondition {
	readonly sourceType: "structure";
	check(graph: Graph): boolean | Promise<boolean>;
}

export interface ExecutableCondition {
	readonly sourceType: "executable";
	/** Actor that evaluates the condition. Defaults to the sender of the mail being interpreted. */
	readonly executableId?: IdType;
	/** Extra data forwarded to the evaluator. */
	readonly context?: Record<string, unknown>;
}

export type EdgeCondition = StructureCondition | ExecutableCondition;

export function structureCondition(check: (graph: Graph) => boolean | Promise<boolean>): StructureCondition {
	return { sourceType: "structure", check };
}

export function executableCondition(
	opts: { executableId?: IdType; context?: Record<string, unknown> } = {},
): ExecutableCondition {
	return { sourceType: "executable", executableId: opts.executableId, context: opts.context };
}
