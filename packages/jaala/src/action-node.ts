/**
 * Bundle targets and the composite action node built from them.
 *
 * An instruction node may own outgoing bundle edges to {@link ToolNode}s and
 * at most one {@link ActionSelectionNode}. When the instruction is reached,
 * the executor folds those targets into an {@link ActionNode}.
 */

import { StructureError } from "@karya/core";
import type { ElementInit } from "@karya/core";
import { Node } from "./node.js";

export interface ToolSpec {
	name: string;
	description?: string;
	parameters?: Record<string, unknown>;
}

export interface ActionSelection {
	action: string;
	args: Record<string, unknown>;
}

export interface ActionPlan {
	instruction: Node;
	tools: ToolNode[];
	action?: string;
	args: Record<string, unknown>;
}

type NodeExtras = ElementInit & { label?: string; metadata?: Record<string, unknown> };

function extrasOf(node: Node): NodeExtras {
	return { id: node.id, createdAt: node.createdAt, label: node.label, metadata: node.metadata };
}

export class ToolNode extends Node<ToolSpec> {
	constructor(spec: ToolSpec, init: NodeExtras = {}) {
		super({ ...init, content: spec });
	}

	get name(): string {
		return this.content.name;
	}

	copy(): ToolNode {
		return new ToolNode({ ...this.content }, extrasOf(this));
	}
}

export class ActionSelectionNode extends Node<ActionSelection> {
	constructor(selection: { action: string; args?: Record<string, unknown> }, init: NodeExtras = {}) {
		super({ ...init, content: { action: selection.action, args: { ...(selection.args ?? {}) } } });
	}

	copy(): ActionSelectionNode {
		return new ActionSelectionNode(this.content, extrasOf(this));
	}
}

/**
 * An instruction node merged with its bundled tools and action selection.
 * Shares the instruction's id so it resolves to the instruction in the graph.
 */
export class ActionNode extends Node<ActionPlan> {
	constructor(plan: ActionPlan) {
		super({
			id: plan.instruction.id,
			content: plan,
			label: plan.instruction.label,
			metadata: plan.instruction.metadata,
		});
	}

	get instruction(): Node {
		return this.content.instruction;
	}

	get tools(): ToolNode[] {
		return this.content.tools;
	}

	get action(): string | undefined {
		return this.content.action;
	}

	get args(): Record<string, unknown> {
		return this.content.args;
	}

	copy(): ActionNode {
		return new ActionNode({
			instruction: this.instruction.copy(),
			tools: this.tools.map((tool) => tool.copy()),
			action: this.action,
			args: { ...this.args },
		});
	}

	/**
	 * @throws StructureError if a bundled node is neither a tool nor an action selection.
	 */
	static fromBundle(instruction: Node, bundled: readonly Node[]): ActionNode {
		const plan: ActionPlan = { instruction, tools: [], args: {} };
		for (const node of bundled) {
			if (node instanceof ActionSelectionNode) {
				plan.action = node.content.action;
				plan.args = { ...node.content.args };
			} else if (node instanceof ToolNode) {
				plan.tools.push(node);
			} else {
				throw new StructureError(`Invalid bundled node ${node.id} (${node.kind}) for instruction ${instruction.id}`);
			}
		}
		return new ActionNode(plan);
	}
}
