import { describe, it, expect } from "vitest";
import {
	KaryaError,
	ItemNotFoundError,
	ItemExistsError,
	TypeConstraintError,
	StructureError,
	TraversalError,
	ConditionTimeoutError,
	InvalidTransitionError,
	ConfigError,
} from "../src/errors.js";

describe("KaryaError", () => {
	it("should carry name, message and code", () => {
		const err = new KaryaError("something broke", "BROKEN");
		expect(err.name).toBe("KaryaError");
		expect(err.message).toBe("something broke");
		expect(err.code).toBe("BROKEN");
		expect(err).toBeInstanceOf(Error);
	});

	it("should chain a cause when given", () => {
		const root = new Error("root");
		const err = new KaryaError("wrapped", "WRAP", root);
		expect(err.cause).toBe(root);
	});

	it("should leave cause undefined when omitted", () => {
		expect(new KaryaError("x", "X").cause).toBeUndefined();
	});
});

describe("ItemNotFoundError", () => {
	it("should describe string and numeric keys", () => {
		expect(new ItemNotFoundError("abc").message).toBe("Item not found: abc");
		expect(new ItemNotFoundError(3).key).toBe("3");
	});

	it("should describe objects by their id", () => {
		const err = new ItemNotFoundError({ id: "node-1" });
		expect(err.key).toBe("node-1");
		expect(err.code).toBe("ITEM_NOT_FOUND");
		expect(err).toBeInstanceOf(KaryaError);
	});

	it("should accept a custom message", () => {
		expect(new ItemNotFoundError("k", "gone").message).toBe("gone");
	});
});

describe("specialised errors", () => {
	it("ItemExistsError", () => {
		const err = new ItemExistsError("abc");
		expect(err.message).toBe("Item already exists: abc");
		expect(err.code).toBe("ITEM_EXISTS");
		expect(err.id).toBe("abc");
	});

	it("TypeConstraintError", () => {
		const err = new TypeConstraintError("bad type");
		expect(err.code).toBe("TYPE_CONSTRAINT");
		expect(err.name).toBe("TypeConstraintError");
	});

	it("StructureError", () => {
		expect(new StructureError("cycle").code).toBe("STRUCTURE_ERROR");
	});

	it("TraversalError records the mail context", () => {
		const cause = new Error("inner");
		const err = new TraversalError("failed", { mailId: "m1", category: "node", nodeId: "n1" }, cause);
		expect(err.code).toBe("TRAVERSAL_ERROR");
		expect(err.mailId).toBe("m1");
		expect(err.category).toBe("node");
		expect(err.nodeId).toBe("n1");
		expect(err.cause).toBe(cause);
	});

	it("ConditionTimeoutError", () => {
		const err = new ConditionTimeoutError("e1", 250);
		expect(err.message).toBe("Condition for edge e1 timed out after 250ms");
		expect(err.edgeId).toBe("e1");
		expect(err.timeoutMs).toBe(250);
		expect(err.code).toBe("CONDITION_TIMEOUT");
	});

	it("InvalidTransitionError", () => {
		const err = new InvalidTransitionError("COMPLETED", "IN_PROGRESS");
		expect(err.message).toBe("Invalid transition: COMPLETED -> IN_PROGRESS");
		expect(err.code).toBe("INVALID_TRANSITION");
	});

	it("ConfigError", () => {
		const err = new ConfigError("bad file");
		expect(err.code).toBe("CONFIG_ERROR");
		expect(err.name).toBe("ConfigError");
	});
});
