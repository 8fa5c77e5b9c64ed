// @karya/pravaha: Execution
export { Executor } from "./executor.js";
export type { ExecutorOptions, TraversalState } from "./executor.js";
export { Coordinator } from "./coordinator.js";
export type {
	ConditionEvaluator,
	ConditionRequest,
	CoordinatorOptions,
	HistoryEntry,
	PerformContext,
	Performer,
} from "./coordinator.js";
export { WorkflowRunner } from "./runner.js";
export type { BranchResult, WorkflowResult, WorkflowRunnerOptions } from "./runner.js";
