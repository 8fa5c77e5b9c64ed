/**
 * Layered, dot-notation configuration stores.
 *
 * A {@link Config} is one layer (defaults, file, environment, override);
 * {@link cascadeConfigs} merges layers left to right so later layers win.
 */

/** Where a config layer came from. */
export type ConfigLayer = "defaults" | "file" | "env" | "override" | "merged";

/** A configuration store with dot-notation key access and layer awareness. */
export interface Config {
	readonly layer: ConfigLayer;
	get(key: string): unknown;
	get<T>(key: string, fallback: T): unknown;
	set(key: string, value: unknown): void;
	has(key: string): boolean;
	delete(key: string): void;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value using a dot-notation key.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	let current: unknown = obj;
	for (const part of key.split(".")) {
		if (!isPlainObject(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-set a nested value using a dot-notation key, creating intermediate
 * objects as needed.
 */
export function deepSet(obj: Record<string, unknown>, key: string, value: unknown): void {
	const parts = key.split(".");
	let current = obj;
	for (const part of parts.slice(0, -1)) {
		const next = current[part];
		if (isPlainObject(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[part] = created;
			current = created;
		}
	}
	current[parts[parts.length - 1]] = value;
}

function deepDelete(obj: Record<string, unknown>, key: string): void {
	const parts = key.split(".");
	let current = obj;
	for (const part of parts.slice(0, -1)) {
		const next = current[part];
		if (!isPlainObject(next)) return;
		current = next;
	}
	delete current[parts[parts.length - 1]];
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced,
 * only plain objects are recursed.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const [key, sv] of Object.entries(source)) {
		const tv = target[key];
		if (isPlainObject(sv) && isPlainObject(tv)) {
			deepMerge(tv, sv);
		} else if (isPlainObject(sv)) {
			const copy: Record<string, unknown> = {};
			deepMerge(copy, sv);
			target[key] = copy;
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object.
 *
 * @example
 * ```ts
 * const cfg = createConfig("override", { work: { capacity: 4 } });
 * cfg.set("mail.refreshInterval", 50);
 * cfg.get("work.capacity"); // 4
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	return {
		layer,

		get(key: string, fallback?: unknown): unknown {
			const val = deepGet(data, key);
			return val !== undefined ? val : fallback;
		},

		set(key: string, value: unknown): void {
			deepSet(data, key, value);
		},

		has(key: string): boolean {
			return deepGet(data, key) !== undefined;
		},

		delete(key: string): void {
			deepDelete(data, key);
		},

		all(): Record<string, unknown> {
			const snapshot: Record<string, unknown> = {};
			deepMerge(snapshot, data);
			return snapshot;
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade config layers into a single merged config. Later layers override
 * earlier ones key by key.
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("merged");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}
