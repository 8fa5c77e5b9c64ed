/**
 * Runtime settings shared by every Karya package.
 *
 * Resolution order: built-in defaults, then `karya.json`, then `KARYA_*`
 * environment variables. The merged result is validated before use.
 */

import fs from "fs";
import path from "path";
import { cascadeConfigs, createConfig } from "./config.js";
import type { Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { v, validate } from "./validation.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RuntimeSettings {
	mail: {
		/** Sleep between MailManager collect/send rounds, in ms. */
		refreshInterval: number;
	};
	executor: {
		/** Sleep between Executor forward steps, in ms. */
		refreshInterval: number;
		/** How long an executable edge condition may wait for its reply, in ms. */
		conditionTimeout: number;
	};
	work: {
		/** Maximum concurrent Work items per batch. */
		capacity: number;
		/** Sleep between WorkQueue batches, in ms. */
		refreshInterval: number;
	};
	runner: {
		/** Upper bound on WorkflowRunner rounds before giving up. */
		maxSteps: number;
	};
}

export const DEFAULT_RUNTIME_SETTINGS: Readonly<RuntimeSettings> = Object.freeze({
	mail: { refreshInterval: 100 },
	executor: { refreshInterval: 100, conditionTimeout: 30_000 },
	work: { capacity: 10, refreshInterval: 1000 },
	runner: { maxSteps: 10_000 },
});

/** Environment variable → dot-notation settings key. */
export const SETTINGS_ENV_VARS: Readonly<Record<string, string>> = {
	KARYA_MAIL_REFRESH_MS: "mail.refreshInterval",
	KARYA_EXECUTOR_REFRESH_MS: "executor.refreshInterval",
	KARYA_CONDITION_TIMEOUT_MS: "executor.conditionTimeout",
	KARYA_WORK_CAPACITY: "work.capacity",
	KARYA_WORK_REFRESH_MS: "work.refreshInterval",
	KARYA_RUNNER_MAX_STEPS: "runner.maxSteps",
};

export const SETTINGS_FILE_NAME = "karya.json";

export interface LoadSettingsOptions {
	/** Explicit settings file. When given, it must exist. */
	filePath?: string;
	/** Directory searched for `karya.json` when `filePath` is omitted. Defaults to cwd. */
	cwd?: string;
	/** Environment to read overrides from. Defaults to `process.env`. */
	env?: Record<string, string | undefined>;
	/** Final layer, applied after the environment. */
	overrides?: Record<string, unknown>;
}

// ─── Schema ──────────────────────────────────────────────────────────────────

const interval = () => v.number().integer().min(0).validate;

const settingsSchema = v.object({
	mail: v.object({ refreshInterval: interval() }).validate,
	executor: v.object({
		refreshInterval: interval(),
		conditionTimeout: v.number().integer().min(1).validate,
	}).validate,
	work: v.object({
		capacity: v.number().integer().min(1).validate,
		refreshInterval: interval(),
	}).validate,
	runner: v.object({ maxSteps: v.number().integer().min(1).validate }).validate,
}).validate;

// ─── Layers ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readFileLayer(filePath: string, required: boolean): Config {
	if (!fs.existsSync(filePath)) {
		if (required) throw new ConfigError(`Settings file not found: ${filePath}`);
		return createConfig("file");
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${filePath}`, err);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Settings file must contain a JSON object: ${filePath}`);
	}
	return createConfig("file", parsed);
}

function readEnvLayer(env: Record<string, string | undefined>): Config {
	const layer = createConfig("env");
	for (const [name, key] of Object.entries(SETTINGS_ENV_VARS)) {
		const raw = env[name]?.trim();
		if (!raw) continue;
		const num = Number(raw);
		if (!Number.isFinite(num)) {
			throw new ConfigError(`${name} must be a number, received "${raw}"`);
		}
		layer.set(key, num);
	}
	return layer;
}

// ─── Loader ──────────────────────────────────────────────────────────────────

/**
 * Resolve runtime settings from defaults, the settings file and the
 * environment.
 *
 * @throws {ConfigError} On an unreadable or malformed file, a non-numeric
 * environment value, or a value outside its allowed range.
 */
export function loadRuntimeSettings(options: LoadSettingsOptions = {}): RuntimeSettings {
	const filePath = options.filePath ?? path.join(options.cwd ?? process.cwd(), SETTINGS_FILE_NAME);

	const merged = cascadeConfigs(
		createConfig("defaults", { ...DEFAULT_RUNTIME_SETTINGS }),
		readFileLayer(filePath, options.filePath !== undefined),
		readEnvLayer(options.env ?? process.env),
		createConfig("override", options.overrides ?? {}),
	);

	const result = validate(merged.all(), settingsSchema, "settings");
	if (!result.valid || result.value === undefined) {
		const detail = result.errors.map((e) => e.message).join("; ");
		throw new ConfigError(`Invalid runtime settings: ${detail}`);
	}
	return result.value;
}
