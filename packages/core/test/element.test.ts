import { describe, it, expect } from "vitest";
import { Element, getId, getIds, isIdType } from "../src/element.js";
import { TypeConstraintError } from "../src/errors.js";

const FIXED_ID = "3b241101-e2bb-4255-8caf-4136c566a962";

describe("Element", () => {
	it("should generate a UUID v4 id and a creation time", () => {
		const before = Date.now();
		const el = new Element();
		expect(isIdType(el.id)).toBe(true);
		expect(el.createdAt).toBeGreaterThanOrEqual(before);
		expect(el.createdAt).toBeLessThanOrEqual(Date.now());
	});

	it("should give every element a distinct id", () => {
		const ids = new Set(Array.from({ length: 50 }, () => new Element().id));
		expect(ids.size).toBe(50);
	});

	it("should accept an explicit id and timestamp", () => {
		const el = new Element({ id: FIXED_ID, createdAt: 42 });
		expect(el.id).toBe(FIXED_ID);
		expect(el.createdAt).toBe(42);
	});

	it("should reject a malformed id", () => {
		expect(() => new Element({ id: "not-a-uuid" })).toThrow(TypeConstraintError);
	});

	it("should compare by id only", () => {
		const a = new Element({ id: FIXED_ID, createdAt: 1 });
		const b = new Element({ id: FIXED_ID, createdAt: 2 });
		expect(a.equals(b)).toBe(true);
		expect(a.equals(FIXED_ID)).toBe(true);
		expect(a.equals(new Element())).toBe(false);
		expect(a.equals("garbage")).toBe(false);
	});

	it("should serialize id and createdAt", () => {
		const el = new Element({ id: FIXED_ID, createdAt: 7 });
		expect(el.toJSON()).toEqual({ id: FIXED_ID, createdAt: 7 });
	});
});

describe("getId / getIds", () => {
	it("should resolve strings and elements", () => {
		const el = new Element({ id: FIXED_ID });
		expect(getId(FIXED_ID)).toBe(FIXED_ID);
		expect(getId(el)).toBe(FIXED_ID);
	});

	it("should throw TypeConstraintError for invalid refs", () => {
		expect(() => getId("nope")).toThrow(TypeConstraintError);
		expect(() => getId({ id: "nope" })).toThrow(TypeConstraintError);
	});

	it("should treat a single ref as a batch of one", () => {
		const a = new Element();
		const b = new Element();
		expect(getIds(a)).toEqual([a.id]);
		expect(getIds([a, b.id])).toEqual([a.id, b.id]);
		expect(getIds([])).toEqual([]);
	});
});
