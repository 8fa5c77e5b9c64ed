// @karya/core: Foundation
export * from "./errors.js";
export {
	Element,
	getId,
	getIds,
	isIdType,
	isRefList,
} from "./element.js";
export type { IdType, IdRef, ElementJSON, ElementInit } from "./element.js";
export { sleep, createDeferred } from "./async.js";
export type { Deferred } from "./async.js";
export { createConfig, cascadeConfigs, deepSet } from "./config.js";
export type { Config, ConfigLayer } from "./config.js";
export {
	DEFAULT_RUNTIME_SETTINGS,
	SETTINGS_ENV_VARS,
	SETTINGS_FILE_NAME,
	loadRuntimeSettings,
} from "./settings.js";
export type { RuntimeSettings, LoadSettingsOptions } from "./settings.js";

// Validation
export { v, validate, assertValid } from "./validation.js";
export type { ValidatorFn, ValidationIssue, ValidationResult } from "./validation.js";

// Observability
export * from "./observability/index.js";
