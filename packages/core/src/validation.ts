/**
 * Runtime validation for settings and other untyped input.
 *
 * Small fluent builders that return plain validator functions, so schemas
 * compose without a schema library.
 */

import { KaryaError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

export interface ValidationIssue {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationIssue[];
	value?: T;
}

// ─── Validators ──────────────────────────────────────────────────────────────

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${typeof value}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

class StringValidator {
	private allowed?: readonly string[];

	oneOf(values: readonly string[]): this {
		this.allowed = values;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${typeof value}` };
		}
		if (this.allowed && !this.allowed.includes(value)) {
			return { valid: false, error: `Expected one of ${this.allowed.join(", ")}, received "${value}"` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private readonly schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${value === null ? "null" : typeof value}` };
		}
		const source = new Map(Object.entries(value));
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const field = validator(source.get(key));
			if (!field.valid) {
				errors.push(`${key}: ${field.error}`);
			} else {
				result[key] = field.value;
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		// Every schema key was validated above, so the record matches the inferred shape.
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private readonly inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const capacityV = v.number().integer().min(1).validate;
 * const workV = v.object({
 *   capacity: capacityV,
 *   refreshInterval: v.number().min(0).validate,
 * }).validate;
 * ```
 */
export const v = {
	number: () => new NumberValidator(),
	string: () => new StringValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value, collecting failures into a {@link ValidationResult}
 * instead of throwing.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>, path = "$"): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{ path, message: result.error ?? "Validation failed", received: value }],
	};
}

/**
 * Validate and return the typed value.
 *
 * @throws KaryaError with code `"VALIDATION_ERROR"` on failure.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validate(value, validator);
	if (!result.valid || result.value === undefined) {
		const prefix = label ? `${label}: ` : "";
		const messages = result.errors.map((e) => `${e.path} ${e.message}`).join("; ");
		throw new KaryaError(`${prefix}${messages}`, "VALIDATION_ERROR");
	}
	return result.value;
}
