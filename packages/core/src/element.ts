/**
 * Element: identity and creation-timestamp primitive.
 *
 * Every addressable entity in Karya (piles, progressions, nodes, edges,
 * mail, actors, work items) extends {@link Element}. Identity is a UUID v4
 * fixed at construction; equality is by id only.
 */

import { randomUUID } from "node:crypto";
import { TypeConstraintError } from "./errors.js";

/** A UUID v4 string identifying an Element. */
export type IdType = string;

/** Anything that can be resolved to an id: the id itself or an object carrying one. */
export type IdRef = IdType | { readonly id: IdType };

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Check whether a value is a well-formed UUID v4 string. */
export function isIdType(value: unknown): value is IdType {
	return typeof value === "string" && UUID_V4.test(value);
}

/**
 * Resolve an {@link IdRef} to its id.
 *
 * @throws TypeConstraintError if the reference is not a valid id or an object with one.
 */
export function getId(ref: IdRef): IdType {
	if (typeof ref === "string") {
		if (!isIdType(ref)) {
			throw new TypeConstraintError(`Invalid id: ${JSON.stringify(ref)}`);
		}
		return ref;
	}
	if (ref !== null && typeof ref === "object" && isIdType(ref.id)) {
		return ref.id;
	}
	throw new TypeConstraintError("Expected an id or an object with an id");
}

/**
 * Resolve a single reference or a batch of references to ids.
 * A lone string or Element is treated as a batch of one.
 */
export function getIds(refs: IdRef | readonly IdRef[]): IdType[] {
	if (isRefList(refs)) {
		return refs.map((r) => getId(r));
	}
	return [getId(refs)];
}

/** Narrow a single-or-batch reference to its batch form. */
export function isRefList<R>(refs: R | readonly R[]): refs is readonly R[] {
	return Array.isArray(refs);
}

/** Serialized shape shared by every Element. */
export interface ElementJSON {
	id: IdType;
	createdAt: number;
}

/** Optional identity overrides, used when reconstructing or cloning. */
export interface ElementInit {
	id?: IdType;
	createdAt?: number;
}

/**
 * Base class for every addressable thing.
 */
export class Element {
	readonly id: IdType;
	readonly createdAt: number;

	constructor(init: ElementInit = {}) {
		if (init.id !== undefined && !isIdType(init.id)) {
			throw new TypeConstraintError(`Invalid id: ${JSON.stringify(init.id)}`);
		}
		this.id = init.id ?? randomUUID();
		this.createdAt = init.createdAt ?? Date.now();
	}

	/** Identity comparison: two elements are equal when their ids match. */
	equals(other: IdRef): boolean {
		try {
			return getId(other) === this.id;
		} catch {
			return false;
		}
	}

	toJSON(): ElementJSON {
		return { id: this.id, createdAt: this.createdAt };
	}
}
