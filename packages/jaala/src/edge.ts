/**
 * Directed edges between graph nodes.
 */

import { Element, getId } from "@karya/core";
import type { ElementInit, ElementJSON, IdRef, IdType } from "@karya/core";
import type { ConditionSource, EdgeCondition } from "./condition.js";

export interface EdgeOptions {
	condition?: EdgeCondition;
	/**
	 * Bundle edges attach their tail to the head as part of a composite
	 * action instead of describing a traversal step.
	 */
	bundle?: boolean;
	label?: string;
}

export interface EdgeInit extends ElementInit, EdgeOptions {
	head: IdRef;
	tail: IdRef;
}

export interface EdgeJSON extends ElementJSON {
	head: IdType;
	tail: IdType;
	bundle: boolean;
	label?: string;
	condition?: { sourceType: ConditionSource; executableId?: IdType };
}

export class Edge extends Element {
	readonly head: IdType;
	readonly tail: IdType;
	readonly condition?: EdgeCondition;
	readonly bundle: boolean;
	label?: string;

	constructor(init: EdgeInit) {
		super(init);
		this.head = getId(init.head);
		this.tail = getId(init.tail);
		this.condition = init.condition;
		this.bundle = init.bundle ?? false;
		this.label = init.label;
	}

	copy(): Edge {
		return new Edge({
			id: this.id,
			createdAt: this.createdAt,
			head: this.head,
			tail: this.tail,
			condition: this.condition,
			bundle: this.bundle,
			label: this.label,
		});
	}

	toJSON(): EdgeJSON {
		const json: EdgeJSON = {
			...super.toJSON(),
			head: this.head,
			tail: this.tail,
			bundle: this.bundle,
			label: this.label,
		};
		if (this.condition) {
			json.condition = this.condition.sourceType === "executable"
				? { sourceType: "executable", executableId: this.condition.executableId }
				: { sourceType: "structure" };
		}
		return json;
	}
}
