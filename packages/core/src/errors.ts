/**
 * Typed error hierarchy for Karya.
 *
 * All Karya errors extend {@link KaryaError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all Karya errors.
 *
 * Carries a machine-readable `code` field (e.g. `"ITEM_NOT_FOUND"`) in
 * addition to the human-readable `message`.
 */
export class KaryaError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "KaryaError";
		this.code = code;
	}
}

/**
 * Lookup by id or index failed and no fallback was supplied.
 */
export class ItemNotFoundError extends KaryaError {
	readonly key: string;

	constructor(key: unknown, message?: string, cause?: unknown) {
		const printable = describeKey(key);
		super(message ?? `Item not found: ${printable}`, "ITEM_NOT_FOUND", cause);
		this.name = "ItemNotFoundError";
		this.key = printable;
	}
}

/**
 * An insertion collided with an element that is already present.
 */
export class ItemExistsError extends KaryaError {
	readonly id: string;

	constructor(id: string, message?: string) {
		super(message ?? `Item already exists: ${id}`, "ITEM_EXISTS");
		this.name = "ItemExistsError";
		this.id = id;
	}
}

/**
 * A value violated a declared type constraint (typed Pile, Progression.extend,
 * malformed id reference).
 */
export class TypeConstraintError extends KaryaError {
	constructor(message: string) {
		super(message, "TYPE_CONSTRAINT");
		this.name = "TypeConstraintError";
	}
}

/**
 * Structural violation of a graph: dangling edge endpoints, duplicate
 * members, executing a cyclic graph, invalid bundle targets.
 */
export class StructureError extends KaryaError {
	constructor(message: string, cause?: unknown) {
		super(message, "STRUCTURE_ERROR", cause);
		this.name = "StructureError";
	}
}

/** Where a traversal failure happened. */
export interface TraversalContext {
	mailId?: string;
	category?: string;
	nodeId?: string;
}

/**
 * Error raised while interpreting a mail during graph traversal.
 *
 * Wraps the original failure as `cause` and records which mail and node
 * were being processed. Fatal to the actor that raised it.
 */
export class TraversalError extends KaryaError {
	readonly mailId?: string;
	readonly category?: string;
	readonly nodeId?: string;

	constructor(message: string, context: TraversalContext = {}, cause?: unknown) {
		super(message, "TRAVERSAL_ERROR", cause);
		this.name = "TraversalError";
		this.mailId = context.mailId;
		this.category = context.category;
		this.nodeId = context.nodeId;
	}
}

/**
 * An executable edge condition did not receive its reply in time.
 */
export class ConditionTimeoutError extends KaryaError {
	readonly edgeId: string;
	readonly timeoutMs: number;

	constructor(edgeId: string, timeoutMs: number) {
		super(`Condition for edge ${edgeId} timed out after ${timeoutMs}ms`, "CONDITION_TIMEOUT");
		this.name = "ConditionTimeoutError";
		this.edgeId = edgeId;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * A lifecycle state machine was asked to move backwards or out of a
 * terminal state.
 */
export class InvalidTransitionError extends KaryaError {
	readonly from: string;
	readonly to: string;

	constructor(from: string, to: string) {
		super(`Invalid transition: ${from} -> ${to}`, "INVALID_TRANSITION");
		this.name = "InvalidTransitionError";
		this.from = from;
		this.to = to;
	}
}

/**
 * Configuration error (unreadable file, invalid JSON, out-of-range value).
 */
export class ConfigError extends KaryaError {
	constructor(message: string, cause?: unknown) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

function describeKey(key: unknown): string {
	if (typeof key === "string" || typeof key === "number") return String(key);
	if (key !== null && typeof key === "object" && "id" in key) {
		return String(key.id);
	}
	try {
		return JSON.stringify(key) ?? String(key);
	} catch {
		return String(key);
	}
}
