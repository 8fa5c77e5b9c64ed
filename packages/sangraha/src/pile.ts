/**
 * Pile: an ordered, keyed set of Elements.
 *
 * Items live in a map keyed by id; their order lives in a {@link Progression}.
 * Both always hold the same ids. Synchronous methods run to completion
 * within one event-loop turn; the `*Async` forms and {@link Pile.withLock}
 * serialize through a per-pile {@link Mutex} for multi-step critical
 * sections that span awaits.
 */

import {
	Element,
	ItemExistsError,
	ItemNotFoundError,
	TypeConstraintError,
	getId,
	isRefList,
} from "@karya/core";
import type { ElementInit, ElementJSON, IdRef, IdType } from "@karya/core";
import { Mutex } from "./mutex.js";
import { Progression } from "./progression.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** A constructor whose instances are Elements. */
export type ElementClass<T extends Element = Element> = abstract new (...args: never[]) => T;

/** Position in the order (negative counts from the end) or an id reference. */
export type PileKey = number | IdRef;

export interface PileInit<T extends Element> extends ElementInit {
	items?: T | Iterable<T>;
	/** Allowed item classes. Omit to accept any Element. */
	itemTypes?: readonly ElementClass[];
	/**
	 * When `true` (default) an item's exact class must be listed. When
	 * `false`, subclasses of a listed class are accepted too.
	 */
	strictType?: boolean;
	name?: string;
}

export interface PileJSON extends ElementJSON {
	name?: string;
	order: IdType[];
	items: ElementJSON[];
}

function isSingleItem<T extends Element>(items: T | Iterable<T>): items is T {
	return items instanceof Element;
}

function toItemList<T extends Element>(items: T | Iterable<T>): T[] {
	return isSingleItem(items) ? [items] : [...items];
}

function yieldToEventLoop(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

// ─── Pile ────────────────────────────────────────────────────────────────────

export class Pile<T extends Element> extends Element implements Iterable<T>, AsyncIterable<T> {
	name?: string;
	readonly itemTypes?: readonly ElementClass[];
	readonly strictType: boolean;

	private readonly items = new Map<IdType, T>();
	private readonly progression = new Progression();
	private readonly lock = new Mutex();

	constructor(init: PileInit<T> = {}) {
		super(init);
		this.name = init.name;
		this.itemTypes = init.itemTypes && init.itemTypes.length > 0 ? [...init.itemTypes] : undefined;
		this.strictType = init.strictType ?? true;
		if (init.items !== undefined) {
			this.include(toItemList(init.items));
		}
	}

	get length(): number {
		return this.progression.length;
	}

	/** Ids in pile order. */
	get order(): IdType[] {
		return this.progression.toArray();
	}

	// ─── Reads ───────────────────────────────────────────────────────────

	/**
	 * Look up an item by position or id.
	 *
	 * @throws ItemNotFoundError when absent and no fallback is given.
	 */
	get(key: PileKey): T;
	get<F>(key: PileKey, fallback: F): T | F;
	get(key: PileKey, ...fallback: unknown[]): unknown {
		const id = this.resolveKey(key);
		const item = id === undefined ? undefined : this.items.get(id);
		if (item !== undefined) return item;
		if (fallback.length > 0) return fallback[0];
		throw new ItemNotFoundError(key);
	}

	/** True when every ref is present. */
	has(refs: IdRef | readonly IdRef[]): boolean {
		const list = isRefList(refs) ? refs : [refs];
		return list.every((ref) => {
			const id = this.tryId(ref);
			return id !== undefined && this.items.has(id);
		});
	}

	indexOf(ref: IdRef): number {
		const id = this.tryId(ref);
		return id === undefined ? -1 : this.progression.toArray().indexOf(id);
	}

	keys(): IdType[] {
		return this.progression.toArray();
	}

	values(): T[] {
		return this.snapshot();
	}

	entries(): Array<[IdType, T]> {
		return this.snapshot().map((item) => [item.id, item]);
	}

	first(): T | undefined {
		return this.length === 0 ? undefined : this.get(0);
	}

	last(): T | undefined {
		return this.length === 0 ? undefined : this.get(-1);
	}

	/** A new pile holding the items in `[start, end)`, with the same type constraint. */
	slice(start?: number, end?: number): Pile<T> {
		return this.derive(this.progression.slice(start, end).map((id) => this.require(id)));
	}

	isEmpty(): boolean {
		return this.length === 0;
	}

	/** True when every item shares one class. */
	isHomogeneous(): boolean {
		const values = this.snapshot();
		if (values.length === 0) return true;
		const ctor = values[0].constructor;
		return values.every((item) => item.constructor === ctor);
	}

	// ─── Mutations ───────────────────────────────────────────────────────

	/**
	 * Replace by position, or upsert by id.
	 *
	 * With an index the item at that position is swapped out. With an id the
	 * key must be the item's own id; the item replaces the stored one in
	 * place or is appended.
	 */
	set(key: PileKey, item: T): void {
		this.checkType(item);
		if (typeof key === "number") {
			const oldId = this.progression.at(key);
			if (oldId !== item.id && this.items.has(item.id)) {
				throw new ItemExistsError(item.id);
			}
			this.items.delete(oldId);
			this.progression.set(key, item.id);
			this.items.set(item.id, item);
			return;
		}

		const id = getId(key);
		if (id !== item.id) {
			throw new TypeConstraintError(`Key ${id} does not match item id ${item.id}`);
		}
		if (!this.items.has(id)) {
			this.progression.append(id);
		}
		this.items.set(id, item);
	}

	/** @throws ItemExistsError when the item is already present. */
	insert(index: number, item: T): void {
		this.checkType(item);
		if (this.items.has(item.id)) throw new ItemExistsError(item.id);
		this.progression.insert(index, item.id);
		this.items.set(item.id, item);
	}

	/** @throws ItemExistsError when the item is already present. */
	append(item: T): void {
		this.checkType(item);
		if (this.items.has(item.id)) throw new ItemExistsError(item.id);
		this.progression.append(item.id);
		this.items.set(item.id, item);
	}

	/**
	 * Remove and return an item by position (default: last) or id.
	 *
	 * @throws ItemNotFoundError when absent and no fallback is given.
	 */
	pop(key?: PileKey): T;
	pop<F>(key: PileKey, fallback: F): T | F;
	pop(key: PileKey = -1, ...fallback: unknown[]): unknown {
		const id = this.resolveKey(key);
		const item = id === undefined ? undefined : this.items.get(id);
		if (item === undefined) {
			if (fallback.length > 0) return fallback[0];
			throw new ItemNotFoundError(key);
		}
		this.items.delete(item.id);
		this.progression.exclude(item.id);
		return item;
	}

	/** @throws ItemNotFoundError on an empty pile. */
	popLeft(): T {
		if (this.length === 0) throw new ItemNotFoundError(0, "Pile is empty");
		return this.pop(0);
	}

	/**
	 * Add items that are not present yet. Idempotent.
	 *
	 * @throws TypeConstraintError before anything is added if any item violates
	 * the type constraint.
	 */
	include(items: T | Iterable<T>): boolean {
		const list = toItemList(items);
		for (const item of list) this.checkType(item);
		for (const item of list) {
			if (!this.items.has(item.id)) {
				this.progression.append(item.id);
				this.items.set(item.id, item);
			}
		}
		return true;
	}

	/**
	 * Remove the referenced items.
	 *
	 * @returns `false` if any ref was absent. Present ones are removed regardless.
	 */
	exclude(refs: IdRef | readonly IdRef[]): boolean {
		const list = isRefList(refs) ? refs : [refs];
		let allPresent = true;
		for (const ref of list) {
			const id = this.tryId(ref);
			if (id === undefined || !this.items.has(id)) {
				allPresent = false;
				continue;
			}
			this.items.delete(id);
			this.progression.exclude(id);
		}
		return allPresent;
	}

	/** Replace stored items in place; include the rest. */
	update(items: T | Iterable<T>): void {
		const list = toItemList(items);
		for (const item of list) this.checkType(item);
		for (const item of list) {
			if (!this.items.has(item.id)) {
				this.progression.append(item.id);
			}
			this.items.set(item.id, item);
		}
	}

	clear(): void {
		this.items.clear();
		this.progression.clear();
	}

	// ─── Lock-guarded forms ──────────────────────────────────────────────

	/** Run `fn` while holding this pile's lock. */
	withLock<R>(fn: () => R | Promise<R>): Promise<R> {
		return this.lock.runExclusive(fn);
	}

	getAsync(key: PileKey): Promise<T>;
	getAsync<F>(key: PileKey, fallback: F): Promise<T | F>;
	getAsync(key: PileKey, ...fallback: unknown[]): Promise<unknown> {
		return this.withLock(() => (fallback.length > 0 ? this.get(key, fallback[0]) : this.get(key)));
	}

	setAsync(key: PileKey, item: T): Promise<void> {
		return this.withLock(() => this.set(key, item));
	}

	popAsync(key?: PileKey): Promise<T>;
	popAsync<F>(key: PileKey, fallback: F): Promise<T | F>;
	popAsync(key: PileKey = -1, ...fallback: unknown[]): Promise<unknown> {
		return this.withLock(() => (fallback.length > 0 ? this.pop(key, fallback[0]) : this.pop(key)));
	}

	includeAsync(items: T | Iterable<T>): Promise<boolean> {
		return this.withLock(() => this.include(items));
	}

	excludeAsync(refs: IdRef | readonly IdRef[]): Promise<boolean> {
		return this.withLock(() => this.exclude(refs));
	}

	updateAsync(items: T | Iterable<T>): Promise<void> {
		return this.withLock(() => this.update(items));
	}

	clearAsync(): Promise<void> {
		return this.withLock(() => this.clear());
	}

	// ─── Iteration ───────────────────────────────────────────────────────

	/**
	 * Iterates a snapshot of the order. Items removed after the snapshot
	 * are skipped; items added after it are not visited.
	 */
	*[Symbol.iterator](): Iterator<T> {
		for (const id of this.progression.toArray()) {
			const item = this.items.get(id);
			if (item !== undefined) yield item;
		}
	}

	/** Snapshot taken under the lock; yields to the event loop after each item. */
	async *[Symbol.asyncIterator](): AsyncIterator<T> {
		const ids = await this.withLock(() => this.progression.toArray());
		for (const id of ids) {
			const item = this.items.get(id);
			if (item !== undefined) yield item;
			await yieldToEventLoop();
		}
	}

	// ─── Set algebra ─────────────────────────────────────────────────────

	/** Items of this pile followed by those of `other` not already present. */
	union(other: Pile<T>): Pile<T> {
		const result = this.derive(this.snapshot());
		result.include(other.values());
		return result;
	}

	intersection(other: Pile<T>): Pile<T> {
		return this.derive(this.snapshot().filter((item) => other.has(item)));
	}

	difference(other: Pile<T>): Pile<T> {
		return this.derive(this.snapshot().filter((item) => !other.has(item)));
	}

	toJSON(): PileJSON {
		return {
			...super.toJSON(),
			name: this.name,
			order: this.progression.toArray(),
			items: this.snapshot().map((item) => item.toJSON()),
		};
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private checkType(item: T): void {
		if (!(item instanceof Element)) {
			throw new TypeConstraintError("Pile items must be Elements");
		}
		const types = this.itemTypes;
		if (types === undefined) return;
		const ok = this.strictType
			? types.some((t) => item.constructor === t)
			: types.some((t) => item instanceof t);
		if (!ok) {
			const allowed = types.map((t) => t.name).join(", ");
			throw new TypeConstraintError(`${item.constructor.name} is not an allowed item type (${allowed})`);
		}
	}

	private resolveKey(key: PileKey): IdType | undefined {
		if (typeof key === "number") {
			const len = this.progression.length;
			const at = key < 0 ? len + key : key;
			if (!Number.isInteger(at) || at < 0 || at >= len) return undefined;
			return this.progression.at(at);
		}
		return this.tryId(key);
	}

	private tryId(ref: IdRef): IdType | undefined {
		try {
			return getId(ref);
		} catch {
			return undefined;
		}
	}

	private require(id: IdType): T {
		const item = this.items.get(id);
		if (item === undefined) throw new ItemNotFoundError(id);
		return item;
	}

	private snapshot(): T[] {
		return this.progression.toArray().map((id) => this.require(id));
	}

	private derive(items: T[]): Pile<T> {
		return new Pile<T>({
			items,
			itemTypes: this.itemTypes,
			strictType: this.strictType,
			name: this.name,
		});
	}
}
