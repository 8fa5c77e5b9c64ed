// @karya/shrama: Work scheduling
export { Work, WorkStatus, isTerminalStatus } from "./work.js";
export type { WorkInit, WorkJSON, WorkTask } from "./work.js";
export { WorkQueue } from "./work-queue.js";
export type { WorkQueueOptions } from "./work-queue.js";
export { WorkLog } from "./work-log.js";
export type { WorkLogOptions } from "./work-log.js";
export { WorkFunction } from "./work-function.js";
export type { RetryOptions, WorkFunctionHandle, WorkFunctionOptions } from "./work-function.js";
export { Worker } from "./worker.js";
export type { WorkerInit, WorkSubmitter } from "./worker.js";
