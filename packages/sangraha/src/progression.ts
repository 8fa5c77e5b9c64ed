/**
 * Progression: an ordered, list-like sequence of element ids.
 *
 * Duplicates are allowed unless inserted through {@link Progression.include}.
 * Every mutator accepts a single reference or a batch; a lone id string or
 * Element counts as a batch of one.
 */

import {
	Element,
	ItemNotFoundError,
	TypeConstraintError,
	getId,
	getIds,
} from "@karya/core";
import type { ElementInit, ElementJSON, IdRef, IdType } from "@karya/core";

export interface ProgressionInit extends ElementInit {
	order?: IdRef | readonly IdRef[];
	name?: string;
}

export interface ProgressionJSON extends ElementJSON {
	name?: string;
	order: IdType[];
}

export class Progression extends Element implements Iterable<IdType> {
	name?: string;
	private order: IdType[];

	constructor(init: ProgressionInit = {}) {
		super(init);
		this.name = init.name;
		this.order = init.order === undefined ? [] : getIds(init.order);
	}

	get length(): number {
		return this.order.length;
	}

	/** Iterates over a snapshot of the order taken when iteration starts. */
	[Symbol.iterator](): Iterator<IdType> {
		return [...this.order][Symbol.iterator]();
	}

	toArray(): IdType[] {
		return [...this.order];
	}

	// ─── Reads ───────────────────────────────────────────────────────────

	/** True when every ref is present. Malformed refs are never present. */
	has(refs: IdRef | readonly IdRef[]): boolean {
		let ids: IdType[];
		try {
			ids = getIds(refs);
		} catch {
			return false;
		}
		return ids.every((id) => this.order.includes(id));
	}

	/** @throws ItemNotFoundError when the index is out of range. */
	at(index: number): IdType {
		return this.order[this.resolveIndex(index)];
	}

	slice(start?: number, end?: number): IdType[] {
		return this.order.slice(start, end);
	}

	/** First position of `ref` at or after `start`, or -1. */
	indexOf(ref: IdRef, start = 0): number {
		return this.order.indexOf(getId(ref), start);
	}

	count(ref: IdRef): number {
		const id = getId(ref);
		return this.order.filter((x) => x === id).length;
	}

	// ─── Positional writes ───────────────────────────────────────────────

	set(index: number, ref: IdRef): void {
		this.order[this.resolveIndex(index)] = getId(ref);
	}

	setSlice(start: number, end: number, refs: IdRef | readonly IdRef[]): void {
		const ids = getIds(refs);
		const [from, to] = this.sliceBounds(start, end);
		this.order.splice(from, to - from, ...ids);
	}

	delete(index: number): void {
		this.order.splice(this.resolveIndex(index), 1);
	}

	deleteSlice(start: number, end: number): void {
		const [from, to] = this.sliceBounds(start, end);
		this.order.splice(from, to - from);
	}

	/** Insert before `index`. Out-of-range indexes clamp to the ends. */
	insert(index: number, refs: IdRef | readonly IdRef[]): void {
		const ids = getIds(refs);
		const len = this.order.length;
		const at = index < 0 ? Math.max(0, len + index) : Math.min(index, len);
		this.order.splice(at, 0, ...ids);
	}

	// ─── Appends and removals ────────────────────────────────────────────

	/** Append every ref, duplicates included. */
	append(refs: IdRef | readonly IdRef[]): void {
		this.order.push(...getIds(refs));
	}

	/**
	 * Append the ids of another Progression. Raw id batches go through
	 * {@link include} instead.
	 */
	extend(other: Progression | readonly IdRef[]): void {
		if (!(other instanceof Progression)) {
			throw new TypeConstraintError("Progression.extend accepts only a Progression; use include() for ids");
		}
		this.order.push(...other.order);
	}

	/**
	 * Append the ids that are not present yet.
	 *
	 * @returns `true` when at least one id was appended or the batch was empty.
	 */
	include(refs: IdRef | readonly IdRef[]): boolean {
		const ids = getIds(refs);
		if (ids.length === 0) return true;
		let added = false;
		for (const id of ids) {
			if (!this.order.includes(id)) {
				this.order.push(id);
				added = true;
			}
		}
		return added;
	}

	/**
	 * Remove every occurrence of each ref.
	 *
	 * @returns `false` when nothing was removed.
	 */
	exclude(refs: IdRef | readonly IdRef[]): boolean {
		const drop = new Set(getIds(refs));
		const before = this.order.length;
		this.order = this.order.filter((id) => !drop.has(id));
		return this.order.length < before;
	}

	/**
	 * Remove every occurrence of each ref.
	 *
	 * @throws ItemNotFoundError if any ref is absent; nothing is removed then.
	 */
	remove(refs: IdRef | readonly IdRef[]): void {
		const ids = getIds(refs);
		const missing = ids.find((id) => !this.order.includes(id));
		if (missing !== undefined) {
			throw new ItemNotFoundError(missing);
		}
		const drop = new Set(ids);
		this.order = this.order.filter((id) => !drop.has(id));
	}

	/** @throws ItemNotFoundError on an empty progression or a bad index. */
	pop(index = -1): IdType {
		const at = this.resolveIndex(index);
		const [id] = this.order.splice(at, 1);
		return id;
	}

	popLeft(): IdType {
		if (this.order.length === 0) {
			throw new ItemNotFoundError(0, "Progression is empty");
		}
		return this.pop(0);
	}

	clear(): void {
		this.order = [];
	}

	// ─── Derived progressions ────────────────────────────────────────────

	/** New progression with the same name and the order reversed. */
	reversed(): Progression {
		return new Progression({ name: this.name, order: [...this.order].reverse() });
	}

	/** New progression with `refs` appended. */
	plus(refs: IdRef | readonly IdRef[]): Progression {
		return new Progression({ name: this.name, order: [...this.order, ...getIds(refs)] });
	}

	/** New progression without any occurrence of `refs`. */
	minus(refs: IdRef | readonly IdRef[]): Progression {
		const drop = new Set(getIds(refs));
		return new Progression({ name: this.name, order: this.order.filter((id) => !drop.has(id)) });
	}

	/**
	 * Two progressions are equal when their names and orders match.
	 * Any other reference compares by id.
	 */
	equals(other: IdRef): boolean {
		if (other instanceof Progression) {
			return this.name === other.name
				&& this.order.length === other.order.length
				&& this.order.every((id, i) => id === other.order[i]);
		}
		return super.equals(other);
	}

	toJSON(): ProgressionJSON {
		return { ...super.toJSON(), name: this.name, order: [...this.order] };
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private resolveIndex(index: number): number {
		const len = this.order.length;
		const at = index < 0 ? len + index : index;
		if (!Number.isInteger(at) || at < 0 || at >= len) {
			throw new ItemNotFoundError(index, `Index ${index} out of range for progression of length ${len}`);
		}
		return at;
	}

	private sliceBounds(start: number, end: number): [number, number] {
		const len = this.order.length;
		const clamp = (i: number): number => (i < 0 ? Math.max(0, len + i) : Math.min(i, len));
		const from = clamp(start);
		return [from, Math.max(from, clamp(end))];
	}
}
