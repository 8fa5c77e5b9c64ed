/**
 * Graph: nodes, directed edges and the adjacency index between them.
 *
 * Edges are only accepted between member nodes. Cycles are allowed while
 * building; {@link Graph.isAcyclic} and {@link Graph.topologicalOrder}
 * check them on demand.
 */

import {
	Element,
	ItemNotFoundError,
	StructureError,
	getId,
} from "@karya/core";
import type { ElementInit, ElementJSON, IdRef, IdType } from "@karya/core";
import { Pile } from "@karya/sangraha";
import { Edge } from "./edge.js";
import type { EdgeJSON, EdgeOptions } from "./edge.js";
import { Node } from "./node.js";
import type { NodeJSON } from "./node.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type EdgeDirection = "in" | "out" | "both";

/** Per-node adjacency: edge id → the node at the other end. */
interface Adjacency {
	in: Map<IdType, IdType>;
	out: Map<IdType, IdType>;
}

export interface GraphInit extends ElementInit {
	name?: string;
	nodes?: Iterable<Node>;
}

export interface GraphJSON extends ElementJSON {
	name?: string;
	nodes: NodeJSON[];
	edges: EdgeJSON[];
}

// DFS colors: unvisited / on the current path / fully explored
const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

// ─── Graph ───────────────────────────────────────────────────────────────────

export class Graph extends Element {
	name?: string;
	private readonly nodes = new Pile<Node>({ itemTypes: [Node], strictType: false });
	private readonly edges = new Pile<Edge>({ itemTypes: [Edge] });
	private readonly index = new Map<IdType, Adjacency>();

	constructor(init: GraphInit = {}) {
		super(init);
		this.name = init.name;
		if (init.nodes) this.addNodes(init.nodes);
	}

	get nodeCount(): number {
		return this.nodes.length;
	}

	get edgeCount(): number {
		return this.edges.length;
	}

	has(ref: IdRef): boolean {
		return this.nodes.has(ref);
	}

	/** Member nodes in insertion order, as a fresh array. */
	nodeList(): Node[] {
		return this.nodes.values();
	}

	/** Member edges in insertion order, as a fresh array. */
	edgeList(): Edge[] {
		return this.edges.values();
	}

	// ─── Nodes ───────────────────────────────────────────────────────────

	/** @throws StructureError if the node is already a member. */
	addNode(node: Node): void {
		if (this.nodes.has(node)) {
			throw new StructureError(`Node ${node.id} already exists in graph ${this.id}`);
		}
		this.nodes.append(node);
		this.index.set(node.id, { in: new Map(), out: new Map() });
	}

	addNodes(nodes: Iterable<Node>): void {
		for (const node of nodes) this.addNode(node);
	}

	/** @throws ItemNotFoundError if the node is not a member. */
	getNode(ref: IdRef): Node {
		return this.nodes.get(ref);
	}

	/**
	 * Remove a node and every edge touching it.
	 *
	 * @throws ItemNotFoundError if the node is not a member.
	 */
	removeNode(ref: IdRef): Node {
		const node = this.getNode(ref);
		for (const edge of this.findNodeEdges(node, "both")) {
			this.removeEdge(edge);
		}
		this.index.delete(node.id);
		return this.nodes.pop(node.id);
	}

	// ─── Edges ───────────────────────────────────────────────────────────

	/**
	 * Connect two member nodes.
	 *
	 * @throws StructureError if either endpoint is not a member.
	 */
	addEdge(head: IdRef, tail: IdRef, opts: EdgeOptions = {}): Edge {
		const edge = new Edge({ head, tail, ...opts });
		this.insertEdge(edge);
		return edge;
	}

	/** @throws StructureError on a dangling endpoint or a duplicate edge. */
	insertEdge(edge: Edge): void {
		const headIdx = this.index.get(edge.head);
		const tailIdx = this.index.get(edge.tail);
		if (!headIdx || !tailIdx) {
			const missing = headIdx ? edge.tail : edge.head;
			throw new StructureError(`Edge ${edge.id} references node ${missing} which is not in graph ${this.id}`);
		}
		if (this.edges.has(edge)) {
			throw new StructureError(`Edge ${edge.id} already exists in graph ${this.id}`);
		}
		this.edges.append(edge);
		headIdx.out.set(edge.id, edge.tail);
		tailIdx.in.set(edge.id, edge.head);
	}

	/** @throws ItemNotFoundError if the edge is not a member. */
	getEdge(ref: IdRef): Edge {
		return this.edges.get(ref);
	}

	/** @throws ItemNotFoundError if the edge is not a member. */
	removeEdge(ref: IdRef): Edge {
		const edge = this.edges.pop(getId(ref), undefined);
		if (edge === undefined) throw new ItemNotFoundError(ref);
		this.index.get(edge.head)?.out.delete(edge.id);
		this.index.get(edge.tail)?.in.delete(edge.id);
		return edge;
	}

	/**
	 * Edges touching a node, in insertion order. With `"both"`, incoming
	 * edges come first; a self-loop is listed once.
	 */
	findNodeEdges(ref: IdRef, direction: EdgeDirection = "both"): Edge[] {
		const adj = this.adjacency(ref);
		const ids: IdType[] = [];
		if (direction !== "out") ids.push(...adj.in.keys());
		if (direction !== "in") {
			for (const id of adj.out.keys()) {
				if (!ids.includes(id)) ids.push(id);
			}
		}
		return ids.map((id) => this.edges.get(id));
	}

	// ─── Topology ────────────────────────────────────────────────────────

	/** Nodes without incoming edges, in node order. */
	getHeads(): Node[] {
		return this.nodes.values().filter((node) => this.adjacency(node).in.size === 0);
	}

	getPredecessors(ref: IdRef): Node[] {
		return this.uniqueNodes(this.adjacency(ref).in.values());
	}

	getSuccessors(ref: IdRef): Node[] {
		return this.uniqueNodes(this.adjacency(ref).out.values());
	}

	/**
	 * Iterative depth-first search with three-color marking. Reaching a node
	 * that is still on the current path means a cycle.
	 */
	isAcyclic(): boolean {
		const color = new Map<IdType, number>();
		for (const id of this.nodes.keys()) color.set(id, WHITE);

		for (const start of this.nodes.keys()) {
			if (color.get(start) !== WHITE) continue;

			const stack: Array<{ id: IdType; next: Iterator<IdType> }> = [
				{ id: start, next: this.adjacency(start).out.values() },
			];
			color.set(start, GRAY);

			while (stack.length > 0) {
				const frame = stack[stack.length - 1];
				const step = frame.next.next();
				if (step.done) {
					color.set(frame.id, BLACK);
					stack.pop();
					continue;
				}
				const neighbor = step.value;
				const c = color.get(neighbor);
				if (c === GRAY) return false;
				if (c === WHITE) {
					color.set(neighbor, GRAY);
					stack.push({ id: neighbor, next: this.adjacency(neighbor).out.values() });
				}
			}
		}
		return true;
	}

	/**
	 * Kahn's algorithm. Ties are broken by node order.
	 *
	 * @throws StructureError if the graph has a cycle.
	 */
	topologicalOrder(): Node[] {
		const inDegree = new Map<IdType, number>();
		for (const [id, adj] of this.index) inDegree.set(id, adj.in.size);

		const queue = this.nodes.keys().filter((id) => inDegree.get(id) === 0);
		const sorted: IdType[] = [];
		while (queue.length > 0) {
			const current = queue.shift();
			if (current === undefined) break;
			sorted.push(current);
			for (const tail of this.adjacency(current).out.values()) {
				const degree = (inDegree.get(tail) ?? 0) - 1;
				inDegree.set(tail, degree);
				if (degree === 0) queue.push(tail);
			}
		}

		if (sorted.length !== this.nodes.length) {
			const remaining = this.nodes.keys().filter((id) => !sorted.includes(id));
			throw new StructureError(`Cycle detected, unable to order nodes: ${remaining.join(", ")}`);
		}
		return sorted.map((id) => this.nodes.get(id));
	}

	// ─── Copy / Serialize ────────────────────────────────────────────────

	/**
	 * Structural copy with the same graph, node and edge ids. Node and edge
	 * objects are shared; membership and adjacency are not.
	 */
	clone(): Graph {
		const copy = new Graph({ id: this.id, createdAt: this.createdAt, name: this.name });
		copy.addNodes(this.nodeList());
		for (const edge of this.edgeList()) copy.insertEdge(edge);
		return copy;
	}

	toJSON(): GraphJSON {
		return {
			...super.toJSON(),
			name: this.name,
			nodes: this.nodeList().map((n) => n.toJSON()),
			edges: this.edgeList().map((e) => e.toJSON()),
		};
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private adjacency(ref: IdRef): Adjacency {
		const id = getId(ref);
		const adj = this.index.get(id);
		if (!adj) throw new ItemNotFoundError(id, `Node ${id} is not in graph ${this.id}`);
		return adj;
	}

	private uniqueNodes(ids: Iterable<IdType>): Node[] {
		return [...new Set(ids)].map((id) => this.nodes.get(id));
	}
}
