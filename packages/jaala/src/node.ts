/**
 * Graph vertices.
 *
 * A Node carries a payload and free-form metadata. It never points at its
 * edges: adjacency belongs to the {@link Graph} that owns the node.
 */

import { Element } from "@karya/core";
import type { ElementInit, ElementJSON } from "@karya/core";

export interface NodeInit<C> extends ElementInit {
	content: C;
	metadata?: Record<string, unknown>;
	label?: string;
}

export interface NodeJSON extends ElementJSON {
	kind: string;
	label?: string;
	content: unknown;
	metadata: Record<string, unknown>;
}

export class Node<C = unknown> extends Element {
	readonly content: C;
	readonly metadata: Record<string, unknown>;
	label?: string;

	constructor(init: NodeInit<C>) {
		super(init);
		this.content = init.content;
		this.metadata = { ...(init.metadata ?? {}) };
		this.label = init.label;
	}

	/**
	 * Same id, class and content with a metadata object of its own. Nodes
	 * leave the graph as copies so other actors cannot write back into it.
	 */
	copy(): Node<C> {
		return new Node<C>({
			id: this.id,
			createdAt: this.createdAt,
			content: this.content,
			metadata: this.metadata,
			label: this.label,
		});
	}

	/** Class name used in serialized output. */
	get kind(): string {
		return this.constructor.name;
	}

	toJSON(): NodeJSON {
		return {
			...super.toJSON(),
			kind: this.kind,
			label: this.label,
			content: this.content,
			metadata: { ...this.metadata },
		};
	}
}
