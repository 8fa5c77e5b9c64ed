// @karya/jaala: Graph
export { Node } from "./node.js";
export type { NodeInit, NodeJSON } from "./node.js";
export { Edge } from "./edge.js";
export type { EdgeInit, EdgeJSON, EdgeOptions } from "./edge.js";
export { structureCondition, executableCondition } from "./condition.js";
export type {
	ConditionSource,
	EdgeCondition,
	ExecutableCondition,
	StructureCondition,
} from "./condition.js";
export { ToolNode, ActionSelectionNode, ActionNode } from "./action-node.js";
export type { ToolSpec, ActionSelection, ActionPlan } from "./action-node.js";
export { Graph } from "./graph.js";
export type { GraphInit, GraphJSON, EdgeDirection } from "./graph.js";
