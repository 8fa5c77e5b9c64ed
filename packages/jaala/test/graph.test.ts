import { describe, it, expect } from "vitest";
import { ItemNotFoundError, StructureError } from "@karya/core";
import { Graph } from "../src/graph.js";
import { Node } from "../src/node.js";
import { ActionNode } from "../src/action-node.js";
import { executableCondition, structureCondition } from "../src/condition.js";

function node(label: string): Node<string> {
	return new Node({ content: label, label });
}

function chain(...labels: string[]): { graph: Graph; nodes: Node<string>[] } {
	const nodes = labels.map(node);
	const graph = new Graph({ nodes });
	for (let i = 0; i + 1 < nodes.length; i++) {
		graph.addEdge(nodes[i], nodes[i + 1]);
	}
	return { graph, nodes };
}

describe("Graph", () => {
	describe("nodes", () => {
		it("should add and look up nodes", () => {
			const a = node("a");
			const graph = new Graph();
			graph.addNode(a);
			expect(graph.has(a)).toBe(true);
			expect(graph.getNode(a.id)).toBe(a);
			expect(graph.nodeCount).toBe(1);
		});

		it("should reject duplicate nodes", () => {
			const a = node("a");
			const graph = new Graph({ nodes: [a] });
			expect(() => graph.addNode(a)).toThrow(StructureError);
		});

		it("should accept node subclasses", () => {
			const graph = new Graph();
			graph.addNode(ActionNode.fromBundle(node("i"), []));
			expect(graph.nodeCount).toBe(1);
		});

		it("should cascade edge removal when a node is removed", () => {
			const { graph, nodes: [a, b, c] } = chain("a", "b", "c");
			graph.removeNode(b);
			expect(graph.edgeCount).toBe(0);
			expect(graph.has(b)).toBe(false);
			expect(graph.getSuccessors(a)).toEqual([]);
			expect(graph.getPredecessors(c)).toEqual([]);
			expect(() => graph.removeNode(b)).toThrow(ItemNotFoundError);
		});
	});

	describe("edges", () => {
		it("should reject edges with a non-member endpoint", () => {
			const a = node("a");
			const graph = new Graph({ nodes: [a] });
			expect(() => graph.addEdge(a, node("outside"))).toThrow(StructureError);
			expect(graph.edgeCount).toBe(0);
		});

		it("should store edge options", () => {
			const [a, b] = [node("a"), node("b")];
			const graph = new Graph({ nodes: [a, b] });
			const cond = executableCondition({ context: { threshold: 2 } });
			const edge = graph.addEdge(a, b, { condition: cond, label: "next" });
			expect(edge.head).toBe(a.id);
			expect(edge.tail).toBe(b.id);
			expect(edge.bundle).toBe(false);
			expect(graph.getEdge(edge.id).condition).toBe(cond);
		});

		it("should reject inserting the same edge twice", () => {
			const { graph } = chain("a", "b");
			const [edge] = graph.edgeList();
			expect(() => graph.insertEdge(edge)).toThrow(StructureError);
		});

		it("should remove edges and update adjacency", () => {
			const { graph, nodes: [a, b] } = chain("a", "b");
			const [edge] = graph.edgeList();
			expect(graph.removeEdge(edge)).toBe(edge);
			expect(graph.getSuccessors(a)).toEqual([]);
			expect(graph.getHeads()).toEqual([a, b]);
			expect(() => graph.removeEdge(edge)).toThrow(ItemNotFoundError);
		});

		it("should list edges by direction in insertion order", () => {
			const [a, b, c] = [node("a"), node("b"), node("c")];
			const graph = new Graph({ nodes: [a, b, c] });
			const ab = graph.addEdge(a, b);
			const bc = graph.addEdge(b, c);
			const ba = graph.addEdge(b, a);
			expect(graph.findNodeEdges(b, "out")).toEqual([bc, ba]);
			expect(graph.findNodeEdges(b, "in")).toEqual([ab]);
			expect(graph.findNodeEdges(b)).toEqual([ab, bc, ba]);
		});

		it("should hand out member lists that leave membership untouched", () => {
			const { graph, nodes: [a, b] } = chain("a", "b");
			const nodes = graph.nodeList();
			const edges = graph.edgeList();
			nodes.push(node("stray"));
			edges.pop();
			expect(graph.nodeCount).toBe(2);
			expect(graph.edgeCount).toBe(1);
			expect(graph.getHeads()).toEqual([a]);
			expect(graph.getSuccessors(a)).toEqual([b]);
			expect(graph.nodeList()).toEqual([a, b]);
		});

		it("should list a self-loop once", () => {
			const a = node("a");
			const graph = new Graph({ nodes: [a] });
			const loop = graph.addEdge(a, a);
			expect(graph.findNodeEdges(a)).toEqual([loop]);
		});
	});

	describe("topology", () => {
		it("should find heads, predecessors and successors", () => {
			const [a, b, c, d] = ["a", "b", "c", "d"].map(node);
			const graph = new Graph({ nodes: [a, b, c, d] });
			graph.addEdge(a, c);
			graph.addEdge(b, c);
			graph.addEdge(c, d);
			graph.addEdge(c, d);
			expect(graph.getHeads()).toEqual([a, b]);
			expect(graph.getPredecessors(c)).toEqual([a, b]);
			expect(graph.getSuccessors(c)).toEqual([d]);
		});

		it("should report a chain as acyclic until it is closed", () => {
			const { graph, nodes: [a, , c] } = chain("a", "b", "c");
			expect(graph.isAcyclic()).toBe(true);
			graph.addEdge(c, a);
			expect(graph.isAcyclic()).toBe(false);
		});

		it("should treat a self-loop as a cycle", () => {
			const a = node("a");
			const graph = new Graph({ nodes: [a] });
			graph.addEdge(a, a);
			expect(graph.isAcyclic()).toBe(false);
		});

		it("should not mistake a diamond for a cycle", () => {
			const [a, b, c, d] = ["a", "b", "c", "d"].map(node);
			const graph = new Graph({ nodes: [a, b, c, d] });
			graph.addEdge(a, b);
			graph.addEdge(a, c);
			graph.addEdge(b, d);
			graph.addEdge(c, d);
			expect(graph.isAcyclic()).toBe(true);
			expect(graph.topologicalOrder().map((n) => n.label)).toEqual(["a", "b", "c", "d"]);
		});

		it("should refuse to order a cyclic graph", () => {
			const { graph, nodes: [a, b] } = chain("a", "b");
			graph.addEdge(b, a);
			expect(() => graph.topologicalOrder()).toThrow(StructureError);
		});

		it("should treat an empty graph as acyclic", () => {
			const graph = new Graph();
			expect(graph.isAcyclic()).toBe(true);
			expect(graph.getHeads()).toEqual([]);
		});

		it("should raise ItemNotFoundError for unknown nodes", () => {
			expect(() => new Graph().getSuccessors(node("x"))).toThrow(ItemNotFoundError);
		});
	});

	describe("clone and serialization", () => {
		it("should copy structure independently", () => {
			const { graph, nodes: [a, b] } = chain("a", "b");
			const copy = graph.clone();
			expect(copy.id).toBe(graph.id);
			expect(copy.getSuccessors(a)).toEqual([b]);
			copy.removeNode(b);
			expect(graph.has(b)).toBe(true);
			expect(graph.getSuccessors(a)).toEqual([b]);
		});

		it("should serialize nodes and edges", () => {
			const [a, b] = [node("a"), node("b")];
			const graph = new Graph({ nodes: [a, b], name: "flow" });
			const e = graph.addEdge(a, b, { condition: structureCondition(() => true) });
			const json = graph.toJSON();
			expect(json.name).toBe("flow");
			expect(json.nodes.map((n) => n.label)).toEqual(["a", "b"]);
			expect(json.nodes[0].kind).toBe("Node");
			expect(json.edges).toEqual([
				{
					id: e.id,
					createdAt: e.createdAt,
					head: a.id,
					tail: b.id,
					bundle: false,
					label: undefined,
					condition: { sourceType: "structure" },
				},
			]);
		});
	});
});
