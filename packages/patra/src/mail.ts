/**
 * Mail: the immutable envelope actors exchange.
 *
 * The body is a closed union tagged by `category`. Every body names the
 * traversal branch it belongs to through `requestSource`.
 */

import { Element, getId } from "@karya/core";
import type { ElementJSON, IdRef, IdType } from "@karya/core";
import type { Edge, Node } from "@karya/jaala";

// ─── Bodies ──────────────────────────────────────────────────────────────────

export type MailCategory = "start" | "end" | "node" | "node_list" | "node_id" | "condition";

export const MAIL_CATEGORIES: readonly MailCategory[] = [
	"start",
	"end",
	"node",
	"node_list",
	"node_id",
	"condition",
];

export interface StartBody {
	category: "start";
	requestSource: IdType;
}

export interface EndBody {
	category: "end";
	requestSource: IdType;
}

export interface NodeBody {
	category: "node";
	requestSource: IdType;
	node: Node;
}

export interface NodeListBody {
	category: "node_list";
	requestSource: IdType;
	nodes: readonly Node[];
}

export interface NodeIdBody {
	category: "node_id";
	requestSource: IdType;
	nodeId: IdType;
}

export interface ConditionRequestBody {
	category: "condition";
	kind: "request";
	requestSource: IdType;
	edge: Edge;
	context?: Readonly<Record<string, unknown>>;
}

export interface ConditionReplyBody {
	category: "condition";
	kind: "reply";
	requestSource: IdType;
	edgeId: IdType;
	result: boolean;
}

export type ConditionBody = ConditionRequestBody | ConditionReplyBody;

export type MailBody = StartBody | EndBody | NodeBody | NodeListBody | NodeIdBody | ConditionBody;

export interface MailJSON extends ElementJSON {
	sender: IdType;
	recipient: IdType;
	category: MailCategory;
	requestSource: IdType;
}

// ─── Mail ────────────────────────────────────────────────────────────────────

export class Mail extends Element {
	readonly sender: IdType;
	readonly recipient: IdType;
	readonly body: Readonly<MailBody>;

	constructor(sender: IdRef, recipient: IdRef, body: MailBody) {
		super();
		this.sender = getId(sender);
		this.recipient = getId(recipient);
		this.body = Object.freeze({ ...body });
		Object.freeze(this);
	}

	get category(): MailCategory {
		return this.body.category;
	}

	get requestSource(): IdType {
		return this.body.requestSource;
	}

	toJSON(): MailJSON {
		return {
			...super.toJSON(),
			sender: this.sender,
			recipient: this.recipient,
			category: this.category,
			requestSource: this.requestSource,
		};
	}
}

export function createMail(sender: IdRef, recipient: IdRef, body: MailBody): Mail {
	return new Mail(sender, recipient, body);
}
